import { Outlet, Link } from 'react-router-dom';
import { Waves, Moon, Sun } from 'lucide-react';
import { usePreferences, WINDOW_HOUR_OPTIONS, type WindowHours } from '../hooks/usePreferences';
import { getProviderDefinition } from '../services/providers';

export function Layout() {
    const { preferences, toggleDarkMode, setWindowHours } = usePreferences();
    const provider = getProviderDefinition('environment-agency');

    return (
        <div className="min-h-screen bg-background text-foreground flex flex-col font-sans transition-colors duration-200">
            <header className="border-b border-border bg-card p-4 sticky top-0 z-[1100] shadow-sm">
                <div className="container mx-auto flex justify-between items-center">
                    <Link to="/" className="flex items-center gap-3 hover:opacity-80 transition-opacity">
                        <div className="bg-primary/10 p-2 rounded-lg">
                            <Waves className="h-6 w-6 text-primary" />
                        </div>
                        <div>
                            <h1 className="text-xl font-bold text-primary">UK Flood Monitoring</h1>
                            <p className="text-xs text-muted-foreground">
                                River level and flow readings over the last {preferences.windowHours} hours
                            </p>
                        </div>
                    </Link>

                    <div className="flex items-center gap-2">
                        <label className="text-sm text-muted-foreground hidden md:flex items-center gap-2">
                            Window
                            <select
                                value={preferences.windowHours}
                                onChange={(e) => {
                                    const hours = WINDOW_HOUR_OPTIONS.find(h => h === Number(e.target.value));
                                    if (hours) setWindowHours(hours);
                                }}
                                className="px-2 py-1 rounded-md border border-border bg-background"
                            >
                                {WINDOW_HOUR_OPTIONS.map((hours: WindowHours) => (
                                    <option key={hours} value={hours}>{hours}h</option>
                                ))}
                            </select>
                        </label>
                        <button
                            onClick={toggleDarkMode}
                            className="p-2 hover:bg-muted rounded-full transition-colors"
                            title="Toggle Theme"
                        >
                            {preferences.darkMode ? <Sun className="h-5 w-5" /> : <Moon className="h-5 w-5" />}
                        </button>
                    </div>
                </div>
            </header>

            <main className="flex-1">
                <Outlet />
            </main>

            <footer className="border-t border-border p-6 bg-card mt-auto">
                <div className="container mx-auto text-sm text-muted-foreground space-y-1">
                    <p><strong>Data Source:</strong> {provider?.name ?? 'Environment Agency'}</p>
                    <p>{provider?.attribution}</p>
                </div>
            </footer>
        </div>
    );
}
