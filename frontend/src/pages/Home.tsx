import { Alert, Card, List, Space, Typography } from 'antd';
import { CRISIS_RESOURCES, EXAMPLE_PROMPTS } from '../constants';

const { Paragraph, Text } = Typography;

export default function Home() {
  return (
    <Space direction="vertical" size="middle" style={{ width: '100%' }}>
      <Alert
        type="warning"
        showIcon
        message="This is peer support, not professional therapy or medical advice."
        description="If you are having thoughts of self-harm or suicide, please reach out right now."
      />
      <Card title="Crisis resources (24/7)" bordered>
        <List
          size="small"
          dataSource={CRISIS_RESOURCES}
          renderItem={(item) => (
            <List.Item>
              <Text strong>{item.value}</Text>
              <Text type="secondary">{item.label}</Text>
            </List.Item>
          )}
        />
      </Card>
      <Card title="Things you can start with" bordered>
        <Paragraph type="secondary">Everything stays on this computer. Nothing is saved when you close the tab.</Paragraph>
        <List size="small" dataSource={EXAMPLE_PROMPTS} renderItem={(item) => <List.Item>{item}</List.Item>} />
      </Card>
    </Space>
  );
}
