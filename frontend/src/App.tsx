import { NavLink, Route, Routes, useLocation } from 'react-router-dom';
import { Badge, Input, Layout, Menu, Space, Typography } from 'antd';
import { DEFAULT_WS_URL, useAppStore, type Connection } from './store/appStore';
import Home from './pages/Home';
import Chat from './pages/Chat';

const { Header, Content, Footer } = Layout;
const { Text, Title } = Typography;

const STATUS: Record<Connection, { status: 'default' | 'processing' | 'success'; label: string }> = {
  offline: { status: 'default', label: 'Offline' },
  connecting: { status: 'processing', label: 'Connecting' },
  ready: { status: 'success', label: 'Connected' }
};

export default function App() {
  const wsUrl = useAppStore((s) => s.wsUrl);
  const setWsUrl = useAppStore((s) => s.setWsUrl);
  const connection = useAppStore((s) => s.connection);
  const { pathname } = useLocation();

  return (
    <Layout style={{ minHeight: '100%', background: '#f7f9fc' }}>
      <Header style={{ display: 'flex', alignItems: 'center', justifyContent: 'space-between', background: '#4a90e2' }}>
        <Title level={4} style={{ color: '#fff', margin: 0 }}>
          Luna
        </Title>
        <Space>
          <Badge status={STATUS[connection].status} text={<Text style={{ color: '#fff' }}>{STATUS[connection].label}</Text>} />
          <Input
            aria-label="Chat server address"
            value={wsUrl}
            onChange={(e) => setWsUrl(e.target.value)}
            disabled={connection !== 'offline'}
            style={{ width: 300 }}
            placeholder={DEFAULT_WS_URL}
          />
        </Space>
      </Header>
      <Menu
        mode="horizontal"
        selectedKeys={[pathname]}
        items={[
          { key: '/', label: <NavLink to="/">Welcome</NavLink> },
          { key: '/chat', label: <NavLink to="/chat">Chat</NavLink> }
        ]}
      />
      <Content style={{ padding: 24, maxWidth: 960, width: '100%', margin: '0 auto' }}>
        <Routes>
          <Route path="/" element={<Home />} />
          <Route path="/chat" element={<Chat />} />
        </Routes>
      </Content>
      <Footer style={{ textAlign: 'center' }}>
        <Text type="secondary">Peer support, not therapy. In an emergency call 911.</Text>
      </Footer>
    </Layout>
  );
}
