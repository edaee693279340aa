import { Routes, type APIMessage, type APIUser } from 'discord-api-types/v10';
import type { RestClient } from './client.ts';

export type AnswerVoters = { users: APIUser[] };

export type AnswerVotersQuery = {
  /** Only users with an id after this one */
  after?: string;
  /** 1-100 */
  limit?: number;
};

export function getAnswerVoters(
  client: RestClient,
  token: string,
  channelId: string,
  messageId: string,
  answerId: number | string,
  page: AnswerVotersQuery = {},
): Promise<AnswerVoters> {
  return client.get<AnswerVoters>(Routes.pollAnswerVoters(channelId, messageId, Number(answerId)), {
    token,
    query: { after: page.after, limit: page.limit },
  });
}

export function endPoll(client: RestClient, token: string, channelId: string, messageId: string): Promise<APIMessage> {
  return client.post<APIMessage>(Routes.expirePoll(channelId, messageId), { token });
}
