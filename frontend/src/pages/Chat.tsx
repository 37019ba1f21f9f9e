import { useEffect, useRef, useState } from 'react';
import { Alert, Button, Card, Input, Space, Tag, Typography } from 'antd';
import { EXAMPLE_PROMPTS, UI_MAX_CHARS } from '../constants';
import { useAppStore } from '../store/appStore';

const { Text } = Typography;

type Line = { role: 'user' | 'assistant'; text: string; state?: string };

export default function Chat() {
  const wsUrl = useAppStore((s) => s.wsUrl);
  const setConnection = useAppStore((s) => s.setConnection);

  const [connected, setConnected] = useState(false);
  const [sessionStarted, setSessionStarted] = useState(false);
  const [waiting, setWaiting] = useState(false);
  const [draft, setDraft] = useState('');
  const [errorText, setErrorText] = useState('');
  const [dialog, setDialog] = useState<Line[]>([]);

  const wsRef = useRef<WebSocket | null>(null);

  const closeWs = () => {
    wsRef.current?.close();
    wsRef.current = null;
  };

  useEffect(() => {
    return () => {
      closeWs();
    };
  }, []);

  const send = (payload: Record<string, unknown>) => {
    if (!wsRef.current || wsRef.current.readyState !== WebSocket.OPEN) return false;
    wsRef.current.send(JSON.stringify(payload));
    return true;
  };

  const connect = () => {
    if (wsRef.current) return;
    setErrorText('');

    const ws = new WebSocket(wsUrl);
    wsRef.current = ws;
    setConnection('connecting');

    ws.onopen = () => {
      setConnected(true);
      ws.send(JSON.stringify({ type: 'start' }));
    };

    ws.onmessage = (ev) => {
      if (typeof ev.data !== 'string') return;
      let msg: Record<string, unknown>;
      try {
        msg = JSON.parse(ev.data);
      } catch {
        setErrorText('Received a message the page could not read.');
        return;
      }
      const type = String(msg.type ?? '');

      if (type === 'ready') {
        setSessionStarted(true);
        setConnection('ready');
        return;
      }
      if (type === 'reply') {
        setWaiting(false);
        setDialog((prev) => [...prev, { role: 'assistant', text: String(msg.text ?? ''), state: String(msg.state ?? '') }]);
        return;
      }
      if (type === 'reset') {
        setDialog([]);
        setWaiting(false);
        return;
      }
      if (type === 'error') {
        setWaiting(false);
        setErrorText(String(msg.message ?? 'Something went wrong.'));
      }
    };

    ws.onclose = () => {
      wsRef.current = null;
      setConnection('offline');
      setConnected(false);
      setSessionStarted(false);
      setWaiting(false);
    };

    ws.onerror = () => {
      setErrorText('Could not reach the companion server. Is it running?');
    };
  };

  const submit = (text: string) => {
    if (!sessionStarted || waiting || text.trim().length === 0) return;
    if (!send({ type: 'message', text })) return;
    setErrorText('');
    setWaiting(true);
    setDialog((prev) => [...prev, { role: 'user', text }]);
    setDraft('');
  };

  return (
    <Card title="Talk with Luna" bordered>
      <Space direction="vertical" size="middle" style={{ width: '100%' }}>
        {errorText ? <Alert type="error" showIcon message={errorText} /> : null}

        <Space wrap>
          <Button type="primary" onClick={connect} disabled={connected}>
            Connect
          </Button>
          <Button onClick={() => send({ type: 'reset' })} disabled={!sessionStarted || waiting}>
            New conversation
          </Button>
          <Button danger onClick={() => send({ type: 'stop', reason: 'frontend_stop' })} disabled={!connected}>
            End
          </Button>
          <Tag color={sessionStarted ? 'green' : 'default'}>{sessionStarted ? 'Connected' : 'Not connected'}</Tag>
          {waiting ? <Tag color="processing">Luna is thinking…</Tag> : null}
        </Space>

        <div style={{ display: 'flex', flexDirection: 'column', gap: 10, minHeight: 240 }}>
          {dialog.length === 0 ? <Text type="secondary">Take your time. Type whenever you are ready.</Text> : null}
          {dialog.map((m, idx) => (
            <div
              key={`${m.role}-${idx}`}
              style={{
                alignSelf: m.role === 'user' ? 'flex-end' : 'flex-start',
                maxWidth: '85%',
                background: m.role === 'user' ? '#4a90e2' : m.state === 'CRISIS_SHORT_CIRCUIT' ? '#fff3cd' : '#f5f5f5',
                color: m.role === 'user' ? '#fff' : '#141414',
                border: '1px solid #d9d9d9',
                borderRadius: 10,
                padding: '10px 14px',
                fontSize: 16,
                lineHeight: 1.6,
                whiteSpace: 'pre-wrap'
              }}
            >
              {m.text}
            </div>
          ))}
        </div>

        <Input.TextArea
          value={draft}
          onChange={(e) => setDraft(e.target.value)}
          autoSize={{ minRows: 3, maxRows: 8 }}
          maxLength={UI_MAX_CHARS}
          showCount
          placeholder="Type your message here..."
          onPressEnter={(e) => {
            if (!e.shiftKey) {
              e.preventDefault();
              submit(draft);
            }
          }}
        />
        <Space wrap>
          <Button type="primary" onClick={() => submit(draft)} disabled={!sessionStarted || waiting || !draft.trim()}>
            Send
          </Button>
          {EXAMPLE_PROMPTS.slice(0, 3).map((p) => (
            <Button key={p} size="small" onClick={() => submit(p)} disabled={!sessionStarted || waiting}>
              {p}
            </Button>
          ))}
        </Space>
      </Space>
    </Card>
  );
}
