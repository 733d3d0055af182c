/** JSON-RPC 2.0 request sent to the Mopidy websocket. */
export interface RpcRequest {
  jsonrpc: '2.0';
  id: number;
  method: string;
  params?: Record<string, unknown>;
}

/** Core event pushed by Mopidy; remaining fields depend on the event name. */
export interface MopidyEventMessage {
  event: string;
  [field: string]: unknown;
}

/** Connection state for the websocket client. */
export enum ConnectionState {
  DISCONNECTED = 0,
  CONNECTING = 1,
  CONNECTED = 2,
}

/** Event callback signature used by the client. */
export type EventCallback = (evt: MopidyEventMessage) => void;
