import { StrictMode } from 'react';
import { createRoot } from 'react-dom/client';
import App from './App';
import { loadConfig } from './config';
import { logger, setLogLevel } from './lib/logger';
import { createDataSource } from './services/dataSourceFactory';
import './index.css';

const config = loadConfig(import.meta.env);
setLogLevel(config.logLevel);
logger.info(`Using flood-monitoring API at ${config.apiBaseUrl}`);

const root = document.getElementById('root');
if (!root) {
    throw new Error('Missing #root element');
}

createRoot(root).render(
    <StrictMode>
        <App dataSource={createDataSource(config)} />
    </StrictMode>
);
