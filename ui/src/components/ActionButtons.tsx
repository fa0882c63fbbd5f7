import React, { useState } from 'react';
import { Button, Space } from 'antd';
import { EditOutlined, PlusCircleOutlined, PlusOutlined, ReloadOutlined } from '@ant-design/icons';
import { useCounterActions, useIsLoading } from '../hooks/useCounter';
import { actionColors } from '../theme/tokens';
import SetCountModal from './SetCountModal';

const ActionButtons: React.FC = () => {
  const actions = useCounterActions();
  const isLoading = useIsLoading();
  const [dialogOpen, setDialogOpen] = useState(false);

  return (
    <>
      <Space wrap size={12} style={{ justifyContent: 'center' }}>
        <Button
          type="primary"
          icon={<PlusOutlined />}
          disabled={isLoading}
          style={{ background: isLoading ? undefined : actionColors.increment }}
          onClick={() => void actions.increment()}
        >
          Increment
        </Button>
        <Button
          type="primary"
          icon={<PlusCircleOutlined />}
          disabled={isLoading}
          style={{ background: isLoading ? undefined : actionColors.batch }}
          onClick={() => void actions.incrementBatch()}
        >
          +10
        </Button>
        <Button
          type="primary"
          icon={<ReloadOutlined />}
          disabled={isLoading}
          style={{ background: isLoading ? undefined : actionColors.reset }}
          onClick={() => void actions.reset()}
        >
          Reset
        </Button>
        <Button
          type="primary"
          icon={<EditOutlined />}
          disabled={isLoading}
          style={{ background: isLoading ? undefined : actionColors.set }}
          onClick={() => setDialogOpen(true)}
        >
          Set
        </Button>
      </Space>

      <SetCountModal
        open={dialogOpen}
        onSubmit={(value) => void actions.setCount(value)}
        onClose={() => setDialogOpen(false)}
      />
    </>
  );
};

export default ActionButtons;
