/**
 * Browser entry point. One ViewModel lives for the lifetime of the page.
 */
import React from 'react';
import ReactDOM from 'react-dom/client';
import { ConfigProvider } from 'antd';
import { CounterViewModel } from 'counter-core';
import App from './App';
import { CounterProvider } from './context/CounterContext';
import { lightTheme } from './theme/tokens';

const viewModel = new CounterViewModel();

const root = document.getElementById('root');
if (root) {
  ReactDOM.createRoot(root).render(
    <React.StrictMode>
      <ConfigProvider theme={lightTheme}>
        <CounterProvider viewModel={viewModel}>
          <App />
        </CounterProvider>
      </ConfigProvider>
    </React.StrictMode>
  );
}
