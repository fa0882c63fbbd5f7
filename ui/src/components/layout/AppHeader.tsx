import React from 'react';
import { Layout, Typography, theme } from 'antd';
import { layout } from '../../theme/tokens';

const { Header } = Layout;
const { Text } = Typography;

interface AppHeaderProps {
  title: string;
}

const AppHeader: React.FC<AppHeaderProps> = ({ title }) => {
  const { token } = theme.useToken();

  return (
    <Header
      style={{
        height: layout.headerHeight,
        padding: '0 24px',
        display: 'flex',
        alignItems: 'center',
        background: token.colorPrimaryBg,
        borderBottom: `1px solid ${token.colorBorderSecondary}`,
      }}
    >
      <Text strong style={{ fontSize: 16 }}>
        {title}
      </Text>
    </Header>
  );
};

export default AppHeader;
