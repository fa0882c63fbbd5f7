import React from 'react';
import { Layout } from 'antd';
import AppHeader from './components/layout/AppHeader';
import Counter from './components/Counter';
import { layout } from './theme/tokens';

const { Content } = Layout;

const App: React.FC = () => (
  <Layout style={{ minHeight: '100vh' }}>
    <AppHeader title="MVVM Counter" />
    <Content style={{ display: 'flex', justifyContent: 'center', alignItems: 'center' }}>
      <div style={{ width: '100%', maxWidth: layout.contentMaxWidth }}>
        <Counter />
      </div>
    </Content>
  </Layout>
);

export default App;
