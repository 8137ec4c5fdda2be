import { Routes, Route, NavLink, useLocation } from 'react-router-dom';
import { Layout, Menu, Input, Typography } from 'antd';
import { useAppStore } from './store/appStore';
import Home from './pages/Home';
import Chat from './pages/Chat';

const { Header, Content } = Layout;
const { Text } = Typography;

export default function App() {
  const { wsUrl, setWsUrl } = useAppStore();
  const location = useLocation();

  return (
    <Layout style={{ minHeight: '100%', background: '#0b0f19' }}>
      <Header style={{ display: 'flex', alignItems: 'center', gap: 16, background: '#0f172a' }}>
        <Text style={{ color: '#e6edf3', fontSize: 18 }}>Chat Bridge 控制台</Text>
        <div style={{ marginLeft: 'auto', display: 'flex', alignItems: 'center', gap: 8 }}>
          <Text style={{ color: '#94a3b8' }}>服务地址</Text>
          <Input
            value={wsUrl}
            onChange={(e) => setWsUrl(e.target.value)}
            style={{ width: 320 }}
            placeholder="ws://localhost:3000/ws/chat"
          />
        </div>
      </Header>
      <Menu
        mode="horizontal"
        theme="dark"
        items={[
          { key: '/', label: <NavLink to="/">对话</NavLink> },
          { key: '/about', label: <NavLink to="/about">概览</NavLink> }
        ]}
        selectedKeys={[location.pathname]}
      />
      <Content style={{ padding: 24 }}>
        <Routes>
          <Route path="/" element={<Chat />} />
          <Route path="/about" element={<Home />} />
        </Routes>
      </Content>
    </Layout>
  );
}
