import type { ReactNode } from 'react';
import { describe, expect, it } from 'vitest';
import { act, renderHook } from '@testing-library/react';
import { PreferencesProvider, usePreferences, withDefaults } from './usePreferences';

const wrapper = ({ children }: { children: ReactNode }) => <PreferencesProvider>{children}</PreferencesProvider>;

describe('withDefaults', () => {
    it('keeps valid stored values and replaces the rest', () => {
        expect(withDefaults({ darkMode: true, windowHours: 6 })).toEqual({ darkMode: true, windowHours: 6 });
        expect(withDefaults({ darkMode: 'yes', windowHours: 48 })).toEqual({ darkMode: false, windowHours: 24 });
        expect(withDefaults(null)).toEqual({ darkMode: false, windowHours: 24 });
    });
});

describe('usePreferences', () => {
    it('restores stored preferences and persists changes', () => {
        localStorage.setItem('flood_monitor_prefs', JSON.stringify({ darkMode: false, windowHours: 12 }));

        const { result } = renderHook(() => usePreferences(), { wrapper });
        expect(result.current.preferences).toEqual({ darkMode: false, windowHours: 12 });

        act(() => {
            result.current.toggleDarkMode();
            result.current.setWindowHours(6);
        });

        expect(result.current.preferences).toEqual({ darkMode: true, windowHours: 6 });
        expect(document.documentElement.classList.contains('dark')).toBe(true);
        expect(JSON.parse(localStorage.getItem('flood_monitor_prefs') ?? '{}')).toEqual({ darkMode: true, windowHours: 6 });
    });

    it('falls back to defaults when storage holds invalid JSON', () => {
        localStorage.setItem('flood_monitor_prefs', '{not json');

        const { result } = renderHook(() => usePreferences(), { wrapper });

        expect(result.current.preferences).toEqual({ darkMode: false, windowHours: 24 });
        expect(document.documentElement.classList.contains('dark')).toBe(false);
    });

    it('throws outside the provider', () => {
        expect(() => renderHook(() => usePreferences())).toThrow('usePreferences must be used within a PreferencesProvider');
    });
});
