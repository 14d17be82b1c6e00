import { resolve } from '../services/ResponseResolver';
import { MessagePlugin } from './types';

export const autoResponsePlugin: MessagePlugin = {
  kind: 'message',
  name: 'auto-response',
  onMessage: ({ message, config }) =>
    message.text ? resolve(message.text, config) : undefined,
};
