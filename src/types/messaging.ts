export interface RelayMessage<T = unknown> {
  channel: string;
  type: string;
  data: T;
  timestamp: string;
}

export type RelayHandler = (message: RelayMessage) => void | Promise<void>;

export type Unsubscribe = () => Promise<void>;

// Frame sent to real-time clients
export interface Frame<T = unknown> {
  type: string;
  data: T;
  timestamp: string;
}
