import React from 'react';
import { theme } from 'antd';
import { useCounterMessage } from '../hooks/useCounter';

const MessageDisplay: React.FC = () => {
  const message = useCounterMessage();
  const { token } = theme.useToken();

  return (
    <div
      data-testid="counter-message"
      style={{
        padding: 16,
        borderRadius: 12,
        border: `1px solid ${token.colorPrimaryBorder}`,
        background: `linear-gradient(90deg, ${token.colorInfoBg}, ${token.colorPrimaryBg})`,
        fontSize: 16,
        fontWeight: 500,
        textAlign: 'center',
      }}
    >
      {message}
    </div>
  );
};

export default MessageDisplay;
