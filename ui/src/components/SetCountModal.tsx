import React, { useState } from 'react';
import { Input, Modal, Typography, message } from 'antd';
import { fold } from 'counter-core';
import { INVALID_NUMBER_MESSAGE, parseCountInput } from '../utils/parse-count';

const { Text } = Typography;

interface SetCountModalProps {
  open: boolean;
  onSubmit: (value: number) => void;
  onClose: () => void;
}

const SetCountModal: React.FC<SetCountModalProps> = ({ open, onSubmit, onClose }) => {
  const [inputValue, setInputValue] = useState('');
  const [messageApi, contextHolder] = message.useMessage();

  const handleOk = () => {
    fold(
      parseCountInput(inputValue),
      () => {
        void messageApi.error(INVALID_NUMBER_MESSAGE);
      },
      (value) => {
        onSubmit(value);
        setInputValue('');
        onClose();
      }
    );
  };

  return (
    <>
      {contextHolder}
      <Modal
        title="Set value"
        open={open}
        okText="Set"
        cancelText="Cancel"
        onOk={handleOk}
        onCancel={onClose}
        destroyOnHidden
      >
        <Input
          autoFocus
          inputMode="numeric"
          value={inputValue}
          onChange={(e) => setInputValue(e.target.value)}
          onPressEnter={handleOk}
          placeholder="a whole number, 0 or more"
        />
        <Text type="secondary" style={{ display: 'block', marginTop: 16, fontSize: 12 }}>
          hint: try 42 or 100!
        </Text>
      </Modal>
    </>
  );
};

export default SetCountModal;
