export { GatewayHost, shouldDispatch, toIncomingMessage } from './gateway.ts';
export type * from './types.ts';
