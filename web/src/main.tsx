import { StrictMode } from 'react';
import { createRoot } from 'react-dom/client';
import { BrowserRouter } from 'react-router-dom';
import './theme.css';
import App from './App';
import { InfographicProvider } from './InfographicProvider';

const container = document.getElementById('root');
if (!container) throw new Error('missing #root element');

createRoot(container).render(
  <StrictMode>
    <InfographicProvider>
      <BrowserRouter>
        <App />
      </BrowserRouter>
    </InfographicProvider>
  </StrictMode>,
);
