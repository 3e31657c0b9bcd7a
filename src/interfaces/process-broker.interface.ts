import type {
  BroadcastMessage,
  RpcRequest,
} from '../communications/control-messages';

export type BroadcastHandler = (
  message: unknown,
  topic: string,
) => void | Promise<void>;

/** Returns the RPC response body sent back to the caller. */
export type RpcHandler = (message: unknown) => unknown | Promise<unknown>;

export type Unsubscribe = () => Promise<void>;

/**
 * Publish/subscribe/RPC primitives of the message broker. Implementations
 * must allow concurrent publishing and per-target subscriptions.
 */
export interface IProcessBroker {
  publish(topic: string, message: BroadcastMessage): Promise<void>;

  /** `topic` may contain `*` segments to match several topics. */
  subscribe(topic: string, handler: BroadcastHandler): Promise<Unsubscribe>;

  /** Serve RPC requests addressed to `target`; one handler per target. */
  serveRpc(target: string, handler: RpcHandler): Promise<Unsubscribe>;

  /** Resolves with the raw response, rejects when it cannot be routed. */
  rpcSend(target: string, message: RpcRequest): Promise<unknown>;
}
