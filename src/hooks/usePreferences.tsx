import { createContext, useContext, useEffect, useState, type ReactNode } from 'react';

const STORAGE_KEY = 'flood_monitor_prefs';

export const WINDOW_HOUR_OPTIONS = [6, 12, 24] as const;
export type WindowHours = typeof WINDOW_HOUR_OPTIONS[number];

export interface Preferences {
    darkMode: boolean;
    windowHours: WindowHours;
}

const DEFAULT_PREFS: Preferences = {
    darkMode: false,
    windowHours: 24
};

type StoredPreferences = Partial<Record<keyof Preferences, unknown>>;

const isStoredPreferences = (value: unknown): value is StoredPreferences => {
    return typeof value === 'object' && value !== null;
};

const isWindowHours = (value: unknown): value is WindowHours =>
    WINDOW_HOUR_OPTIONS.some(option => option === value);

export const withDefaults = (stored: unknown): Preferences => {
    if (!isStoredPreferences(stored)) return DEFAULT_PREFS;

    return {
        darkMode: stored.darkMode === true,
        windowHours: isWindowHours(stored.windowHours) ? stored.windowHours : DEFAULT_PREFS.windowHours
    };
};

interface PreferencesContextValue {
    preferences: Preferences;
    toggleDarkMode: () => void;
    setWindowHours: (hours: WindowHours) => void;
}

const PreferencesContext = createContext<PreferencesContextValue | null>(null);

export function PreferencesProvider({ children }: { children: ReactNode }) {
    const [prefs, setPrefs] = useState<Preferences>(() => {
        try {
            const stored = localStorage.getItem(STORAGE_KEY);
            return stored ? withDefaults(JSON.parse(stored)) : DEFAULT_PREFS;
        } catch {
            return DEFAULT_PREFS;
        }
    });

    useEffect(() => {
        localStorage.setItem(STORAGE_KEY, JSON.stringify(prefs));
        if (prefs.darkMode) {
            document.documentElement.classList.add('dark');
        } else {
            document.documentElement.classList.remove('dark');
        }
    }, [prefs]);

    const toggleDarkMode = () => setPrefs(p => ({ ...p, darkMode: !p.darkMode }));
    const setWindowHours = (windowHours: WindowHours) => setPrefs(p => ({ ...p, windowHours }));

    return (
        <PreferencesContext.Provider value={{ preferences: prefs, toggleDarkMode, setWindowHours }}>
            {children}
        </PreferencesContext.Provider>
    );
}

// Hooks are exported from this module alongside the provider for convenience in consumers.
// eslint-disable-next-line react-refresh/only-export-components
export function usePreferences() {
    const context = useContext(PreferencesContext);
    if (!context) {
        throw new Error('usePreferences must be used within a PreferencesProvider');
    }
    return context;
}
