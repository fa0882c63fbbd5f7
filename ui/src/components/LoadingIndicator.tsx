import React from 'react';
import { Space, Spin } from 'antd';
import { useIsLoading } from '../hooks/useCounter';

export const LOADING_TEXT = 'processing...';

const LoadingIndicator: React.FC = () => {
  const isLoading = useIsLoading();

  return (
    <div
      data-testid="loading-indicator"
      aria-hidden={!isLoading}
      style={{ opacity: isLoading ? 1 : 0, transition: 'opacity 0.3s ease' }}
    >
      <Space size="small">
        <Spin size="small" />
        <span>{LOADING_TEXT}</span>
      </Space>
    </div>
  );
};

export default LoadingIndicator;
