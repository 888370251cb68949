import { StrictMode } from 'react';
import { createRoot } from 'react-dom/client';
import { BrowserRouter } from 'react-router-dom';
import App from './App';
import { DashProvider } from './contexts/DashContext';
import { loadConfig } from './lib/config';
import { createDashService } from './lib/dashService';
import { createReportStore } from './lib/supabaseClient';
import './index.css';

const root = document.getElementById('root');
if (!root) throw new Error('Missing #root element in index.html');

const service = createDashService(createReportStore(loadConfig()));

createRoot(root).render(
  <StrictMode>
    <BrowserRouter>
      <DashProvider service={service}>
        <App />
      </DashProvider>
    </BrowserRouter>
  </StrictMode>
);
