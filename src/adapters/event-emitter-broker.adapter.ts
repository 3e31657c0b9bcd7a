import { Logger } from '@nestjs/common';
import { EventEmitter2 } from '@nestjs/event-emitter';
import type {
  BroadcastMessage,
  RpcRequest,
} from '../communications/control-messages';
import { UnroutableMessageError } from '../errors/unroutable-message.error';
import type {
  BroadcastHandler,
  IProcessBroker,
  RpcHandler,
  Unsubscribe,
} from '../interfaces/process-broker.interface';

/** Messages cross the broker as JSON, as they would on a wire. */
function cloneJson(value: unknown): unknown {
  return value === undefined ? undefined : JSON.parse(JSON.stringify(value));
}

function nextTick(): Promise<void> {
  return new Promise<void>((resolve) => setImmediate(resolve));
}

/**
 * In-process broker on EventEmitter2. Topics are dot-delimited and may be
 * subscribed with `*` wildcards; delivery happens on a later turn of the
 * event loop.
 */
export class EventEmitterBroker implements IProcessBroker {
  private readonly logger = new Logger(EventEmitterBroker.name);
  private readonly emitter = new EventEmitter2({
    wildcard: true,
    delimiter: '.',
    maxListeners: 0,
  });
  private readonly rpcHandlers = new Map<string, RpcHandler>();

  async publish(topic: string, message: BroadcastMessage): Promise<void> {
    const payload = cloneJson(message);
    await nextTick();
    this.emitter.emit(topic, payload, topic);
  }

  async subscribe(topic: string, handler: BroadcastHandler): Promise<Unsubscribe> {
    const listener = (message: unknown, deliveredTopic: unknown): void => {
      const actualTopic = typeof deliveredTopic === 'string' ? deliveredTopic : topic;
      try {
        Promise.resolve(handler(message, actualTopic)).catch((error: unknown) =>
          this.logHandlerFailure(actualTopic, error),
        );
      } catch (error) {
        this.logHandlerFailure(actualTopic, error);
      }
    };
    this.emitter.on(topic, listener);
    return async () => {
      this.emitter.off(topic, listener);
    };
  }

  async serveRpc(target: string, handler: RpcHandler): Promise<Unsubscribe> {
    if (this.rpcHandlers.has(target)) {
      throw new Error(`RPC target "${target}" is already served`);
    }
    this.rpcHandlers.set(target, handler);
    return async () => {
      if (this.rpcHandlers.get(target) === handler) {
        this.rpcHandlers.delete(target);
      }
    };
  }

  async rpcSend(target: string, message: RpcRequest): Promise<unknown> {
    const handler = this.rpcHandlers.get(target);
    if (handler === undefined) {
      throw new UnroutableMessageError(target);
    }
    const request = cloneJson(message);
    await nextTick();
    return cloneJson(await handler(request));
  }

  hasRpcTarget(target: string): boolean {
    return this.rpcHandlers.has(target);
  }

  private logHandlerFailure(topic: string, error: unknown): void {
    this.logger.error(
      `Subscriber of ${topic} failed`,
      error instanceof Error ? error.stack : String(error),
    );
  }
}
