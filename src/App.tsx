import { useMemo } from 'react';
import { HashRouter, Routes, Route } from 'react-router-dom';
import { Layout } from './components/Layout';
import { Dashboard } from './pages/Dashboard';
import { PreferencesProvider } from './hooks/usePreferences';
import { MonitoringSession } from './session/monitoringSession';
import type { DataSource } from './types';

function App({ dataSource }: { dataSource: DataSource }) {
    // One session per data source, shared by every route.
    const session = useMemo(() => new MonitoringSession(dataSource), [dataSource]);

    return (
        <PreferencesProvider>
            <HashRouter>
                <Routes>
                    <Route path="/" element={<Layout />}>
                        <Route index element={<Dashboard session={session} />} />
                        <Route path="stations/:stationId" element={<Dashboard session={session} />} />
                    </Route>
                </Routes>
            </HashRouter>
        </PreferencesProvider>
    );
}

export default App;
