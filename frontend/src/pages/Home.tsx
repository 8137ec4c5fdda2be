import { Card, List } from 'antd';

const data = [
  '后端 WebSocket：/ws/chat，健康检查：/health',
  '每个连接独立的会话与对话记录，断开即丢弃',
  '每次只把最新一条用户消息发送给模型',
  '错误信息以助手回复的形式显示在对话中',
  'API Key 只保存在页面内存中，不落盘、不写日志'
];

export default function Home() {
  return (
    <Card title="概览" bordered style={{ background: '#111827', color: '#e6edf3' }}>
      <List
        size="small"
        dataSource={data}
        renderItem={(item) => <List.Item style={{ color: '#cbd5f5' }}>{item}</List.Item>}
      />
    </Card>
  );
}
