import {
  CreateMessageRecordData,
  DatabaseResult,
  MessageCounts,
  MessageRecord,
} from '../models';
import { MessageLogStore } from '../stores';

export class MemoryMessageLogStore implements MessageLogStore {
  private readonly records: MessageRecord[] = [];
  private nextId = 1;

  async append(
    data: CreateMessageRecordData,
  ): Promise<DatabaseResult<MessageRecord>> {
    const record: MessageRecord = Object.freeze({
      record_id: this.nextId++,
      bot_id: data.bot_id,
      chat_id: data.chat_id,
      user_id: data.user_id,
      message_type: data.message_type,
      created_at: data.created_at ?? new Date(),
    });
    this.records.push(record);
    return { success: true, data: record, affected_rows: 1 };
  }

  async countMessages(
    botId: number,
    chatId: string,
    since: Date,
  ): Promise<DatabaseResult<MessageCounts>> {
    const chatRecords = this.records.filter(
      (record) => record.bot_id === botId && record.chat_id === chatId,
    );

    return {
      success: true,
      data: {
        total_messages: chatRecords.length,
        recent_messages: chatRecords.filter(
          (record) => record.created_at >= since,
        ).length,
        unique_users: new Set(chatRecords.map((record) => record.user_id))
          .size,
      },
    };
  }
}
