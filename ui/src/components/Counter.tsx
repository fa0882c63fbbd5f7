import React from 'react';
import { FloatButton, Space } from 'antd';
import { LoadingOutlined, PlusOutlined } from '@ant-design/icons';
import CounterDisplay from './CounterDisplay';
import MessageDisplay from './MessageDisplay';
import LoadingIndicator from './LoadingIndicator';
import ActionButtons from './ActionButtons';
import { useCounterActions, useIsLoading } from '../hooks/useCounter';

const IncrementFloatButton: React.FC = () => {
  const actions = useCounterActions();
  const isLoading = useIsLoading();

  return (
    <FloatButton
      type="primary"
      tooltip="increment the counter"
      icon={isLoading ? <LoadingOutlined /> : <PlusOutlined />}
      onClick={isLoading ? undefined : () => void actions.increment()}
    />
  );
};

const Counter: React.FC = () => (
  <>
    <Space direction="vertical" size={24} align="center" style={{ width: '100%', padding: 16 }}>
      <CounterDisplay />
      <MessageDisplay />
      <LoadingIndicator />
      <ActionButtons />
    </Space>
    <IncrementFloatButton />
  </>
);

export default Counter;
