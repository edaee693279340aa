/**
 * Gateway 연동 타입
 * discord.js를 직접 노출하지 않고 호스트 루프에서 쓰는 형태만 정의.
 */

export type IncomingMessage = {
  id: string;
  content: string;
  author: {
    id: string;
    bot: boolean;
  };
  channelId: string;
  /** thread에서 온 메시지면 부모 채널 ID */
  parentChannelId: string | null;
};

export type MessageFilter = {
  channelId?: string;
  ownerId?: string;
};

export interface GatewayHostConfig extends MessageFilter {
  token: string;
  /** Post `Error: ...` back to the channel when a command fails */
  reportErrors?: boolean;
  intents?: number[];
}
