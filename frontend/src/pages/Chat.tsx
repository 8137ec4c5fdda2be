import { useEffect, useReducer, useRef, useState } from 'react';
import { Alert, Button, Card, Collapse, Divider, Input, Space, Tag, Typography } from 'antd';
import { useAppStore } from '../store/appStore';
import { applyServerMessage, initialTranscript, parseServerMessage } from '../lib/transcript';
import type { ClientMessage } from '../../../src/adapters/protocol';

const { Title, Text } = Typography;

const LOG_LIMIT = 300;

function summarizeClientMessage(payload: ClientMessage): string {
  if (payload.type === 'submit') {
    return JSON.stringify({ type: payload.type, api_key: payload.api_key ? '<redacted>' : '', text: payload.text });
  }
  return JSON.stringify(payload);
}

export default function Chat() {
  const wsUrl = useAppStore((s) => s.wsUrl);
  const apiKey = useAppStore((s) => s.apiKey);
  const setApiKey = useAppStore((s) => s.setApiKey);

  const [transcript, dispatch] = useReducer(applyServerMessage, initialTranscript);
  const [connected, setConnected] = useState(false);
  const [draft, setDraft] = useState('');
  const [errorText, setErrorText] = useState('');
  const [logs, setLogs] = useState<string[]>([]);
  const [logsExpanded, setLogsExpanded] = useState(false);

  const wsRef = useRef<WebSocket | null>(null);

  const log = (msg: string) => {
    const ts = new Date().toISOString().slice(11, 19);
    setLogs((prev) => [...prev, `[${ts}] ${msg}`].slice(-LOG_LIMIT));
  };

  const send = (payload: ClientMessage) => {
    if (!wsRef.current || wsRef.current.readyState !== WebSocket.OPEN) return;
    wsRef.current.send(JSON.stringify(payload));
    log(`=> ${summarizeClientMessage(payload)}`);
  };

  const closeWs = () => {
    wsRef.current?.close();
    wsRef.current = null;
    setConnected(false);
  };

  useEffect(() => {
    return () => closeWs();
  }, []);

  const connect = () => {
    if (wsRef.current) return;
    setErrorText('');

    const ws = new WebSocket(wsUrl);
    wsRef.current = ws;

    ws.onopen = () => {
      setConnected(true);
      log('WebSocket 已连接');
      send({ type: 'start' });
    };

    ws.onmessage = (ev) => {
      if (typeof ev.data !== 'string') return;
      const msg = parseServerMessage(ev.data);
      if (!msg) {
        log(`<= (无法解析) ${ev.data.slice(0, 120)}`);
        return;
      }
      log(`<= ${msg.type}`);
      if (msg.type === 'error') {
        setErrorText(`${msg.code}: ${msg.message}`);
      }
      dispatch(msg);
    };

    ws.onclose = () => {
      wsRef.current = null;
      setConnected(false);
      log('WebSocket 已关闭');
    };

    ws.onerror = () => {
      setErrorText('WebSocket 错误');
      log('WebSocket 错误');
    };
  };

  const disconnect = () => {
    send({ type: 'stop', reason: 'frontend_stop' });
    closeWs();
  };

  const submit = () => {
    if (transcript.pending) return;
    send({ type: 'submit', api_key: apiKey, text: draft });
    setDraft('');
  };

  return (
    <Card bordered style={{ background: '#fff', color: '#141414' }}>
      <Space direction="vertical" size="middle" style={{ width: '100%' }}>
        <div>
          <Title level={3} style={{ marginBottom: 4 }}>
            {transcript.title || '对话'}
          </Title>
          <Text type="secondary">{transcript.subtitle}</Text>
        </div>

        {errorText ? <Alert type="error" showIcon message={errorText} /> : null}
        {transcript.notice ? <Alert type="warning" showIcon message={transcript.notice} /> : null}

        <Space wrap>
          <Input.Password
            placeholder="请输入 OpenRouter API Key"
            value={apiKey}
            onChange={(e) => setApiKey(e.target.value)}
            style={{ width: 360 }}
            autoComplete="off"
          />
          <Button type="primary" onClick={connect} disabled={connected}>
            连接
          </Button>
          <Button danger onClick={disconnect} disabled={!connected}>
            断开
          </Button>
          <Tag color={connected ? 'green' : 'red'}>{connected ? '已连接' : '未连接'}</Tag>
          <Tag color={transcript.pending ? 'processing' : 'default'}>{transcript.pending ? '等待回复' : '空闲'}</Tag>
        </Space>

        <Divider style={{ margin: '8px 0' }} />

        <Card size="small" title="对话记录" bodyStyle={{ padding: 12 }}>
          <div style={{ display: 'flex', flexDirection: 'column', gap: 12 }}>
            {transcript.turns.length === 0 ? <Text type="secondary">暂无消息</Text> : null}
            {transcript.turns.map((m, idx) => (
              <div
                key={`${m.role}-${idx}`}
                style={{
                  alignSelf: m.role === 'assistant' ? 'flex-start' : 'flex-end',
                  maxWidth: '80%',
                  background: m.role === 'assistant' ? '#f5f5f5' : '#e6f4ff',
                  border: '1px solid #d9d9d9',
                  borderRadius: 8,
                  padding: '8px 10px',
                  color: '#141414',
                  whiteSpace: 'pre-wrap'
                }}
              >
                <Text strong style={{ display: 'block', fontSize: 12 }}>
                  {m.role === 'assistant' ? '助手' : '用户'}
                </Text>
                {m.content || '(空)'}
              </div>
            ))}
          </div>
        </Card>

        <Space.Compact style={{ width: '100%' }}>
          <Input
            placeholder="输入消息..."
            value={draft}
            onChange={(e) => setDraft(e.target.value)}
            onPressEnter={submit}
            disabled={!connected || transcript.ended}
          />
          <Button type="primary" onClick={submit} disabled={!connected || transcript.pending || transcript.ended}>
            发送
          </Button>
        </Space.Compact>

        <Space align="center" style={{ width: '100%', justifyContent: 'space-between' }}>
          <Space>
            <Button onClick={() => setLogsExpanded((v) => !v)} size="small">
              {logsExpanded ? '收起日志' : '展开日志'}
            </Button>
            <Button onClick={() => setLogs([])} size="small" disabled={logs.length === 0}>
              清空日志
            </Button>
          </Space>
          <Tag color="default">最多保留 {LOG_LIMIT} 条</Tag>
        </Space>

        <Collapse
          activeKey={logsExpanded ? ['logs'] : []}
          onChange={(keys) => setLogsExpanded(keys.length > 0)}
          items={[
            {
              key: 'logs',
              label: '调试日志',
              children: (
                <div
                  style={{
                    fontFamily: 'ui-monospace, SFMono-Regular, Menlo, Monaco, Consolas, monospace',
                    fontSize: 12,
                    maxHeight: 280,
                    overflow: 'auto',
                    whiteSpace: 'pre-wrap'
                  }}
                >
                  {logs.length === 0 ? <div style={{ color: '#8c8c8c' }}>暂无日志</div> : logs.map((l, i) => <div key={i}>{l}</div>)}
                </div>
              )
            }
          ]}
        />
      </Space>
    </Card>
  );
}
