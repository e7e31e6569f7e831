// Module stand-in for ioredis, loaded through jest.mock
import { EventEmitter } from "events";

export const instances: Redis[] = [];

export class Redis extends EventEmitter {
  status = "wait";
  readonly connect = jest.fn(async () => {
    this.status = "ready";
  });
  readonly disconnect = jest.fn(() => {
    this.status = "end";
  });
  readonly publish = jest.fn(async (_channel: string, _message: string) => 1);
  readonly subscribe = jest.fn(async (_channel: string) => 1);
  readonly unsubscribe = jest.fn(async (_channel: string) => 1);

  constructor(
    public readonly url: string,
    public readonly options: Record<string, unknown>
  ) {
    super();
    instances.push(this);
  }
}
