import React from 'react';
import { Card, Spin, Typography } from 'antd';
import { useCount, useIsLoading } from '../hooks/useCounter';
import { getCountColor } from '../theme/tokens';

const { Title } = Typography;

const CounterDisplay: React.FC = () => {
  const count = useCount();
  const isLoading = useIsLoading();

  return (
    <Card style={{ textAlign: 'center', minWidth: 240 }}>
      <Title level={4} style={{ marginTop: 0 }}>
        Counter
      </Title>
      <div style={{ minHeight: 72, display: 'flex', alignItems: 'center', justifyContent: 'center' }}>
        {isLoading ? (
          <span data-testid="count-loading">
            <Spin size="large" />
          </span>
        ) : (
          <span
            data-testid="count-value"
            style={{ fontSize: 56, fontWeight: 700, fontFamily: 'monospace', color: getCountColor(count) }}
          >
            {count}
          </span>
        )}
      </div>
    </Card>
  );
};

export default CounterDisplay;
