import { EventEmitter2 } from '@nestjs/event-emitter';
import { EventEmitterBroker } from '../../src/adapters/event-emitter-broker.adapter';
import { InMemoryCheckpointStore } from '../../src/adapters/in-memory-checkpoint.store';
import { RemoteProcessController } from '../../src/communications/remote-process-controller';
import { ProcessTypeNotRegisteredError } from '../../src/errors/process-type-not-registered.error';
import { RemoteControlError } from '../../src/errors/remote-control.error';
import { ProcessEventType } from '../../src/events/process-event-type.enum';
import type {
  ProcessCheckpointFailedEvent,
  ProcessCreatedEvent,
  ProcessTerminatedEvent,
  ProcessTransitionEvent,
} from '../../src/events/process-events';
import type { ProcessBundle } from '../../src/interfaces/process-records.interface';
import { ProcessState } from '../../src/process/process-states';
import { ProcessManager } from '../../src/services/process-manager.service';
import { ProcessPersister } from '../../src/services/process-persister.service';
import { ProcessRegistry } from '../../src/services/process-registry.service';
import {
  ApprovalProcess,
  CounterProcess,
  DoublerProcess,
  waitUntil,
} from '../helpers';

class OfflineStore extends InMemoryCheckpointStore {
  async save(): Promise<void> {
    throw new Error('store offline');
  }
}

function createManager(
  store: InMemoryCheckpointStore,
  broker = new EventEmitterBroker(),
): {
  manager: ProcessManager;
  persister: ProcessPersister;
  eventEmitter: EventEmitter2;
  broker: EventEmitterBroker;
} {
  const registry = new ProcessRegistry({
    processes: [DoublerProcess, ApprovalProcess, CounterProcess],
  });
  const persister = new ProcessPersister(registry, store);
  const eventEmitter = new EventEmitter2();
  const manager = new ProcessManager(registry, persister, broker, eventEmitter, {
    broadcastTimeoutMs: 1000,
    checkpointOnTransition: true,
  });
  return { manager, persister, eventEmitter, broker };
}

describe('ProcessManager', () => {
  let store: InMemoryCheckpointStore;
  let manager: ProcessManager;
  let eventEmitter: EventEmitter2;
  let broker: EventEmitterBroker;

  beforeEach(async () => {
    store = new InMemoryCheckpointStore();
    ({ manager, eventEmitter, broker } = createManager(store));
    await manager.onModuleInit();
  });

  afterEach(async () => {
    jest.restoreAllMocks();
    await manager.onModuleDestroy();
  });

  describe('launch', () => {
    it('should run a process to completion and retire it', async () => {
      const process = await manager.launch('doubler', { x: 5 }, { pid: 'd-1' });

      await expect(process.whenTerminated()).resolves.toBe(ProcessState.FINISHED);
      expect(process.result).toEqual({ y: 10 });
      expect(manager.get('d-1')).toBeUndefined();

      await process.flush();
      const record = await store.load('d-1');
      expect(record?.label).toBe('finished');
      expect(record?.typeId).toBe('doubler');
    });

    it('should emit created, transition and terminated events', async () => {
      const created: ProcessCreatedEvent[] = [];
      const transitions: ProcessTransitionEvent[] = [];
      const terminated: ProcessTerminatedEvent[] = [];
      eventEmitter.on(ProcessEventType.CREATED, (event: ProcessCreatedEvent) =>
        created.push(event),
      );
      eventEmitter.on(ProcessEventType.TRANSITION, (event: ProcessTransitionEvent) =>
        transitions.push(event),
      );
      eventEmitter.on(ProcessEventType.TERMINATED, (event: ProcessTerminatedEvent) =>
        terminated.push(event),
      );

      const process = await manager.launch('doubler', { x: 2 }, { pid: 'd-2' });
      await process.whenTerminated();

      expect(created).toEqual([
        expect.objectContaining({ processType: 'doubler', pid: 'd-2', inputs: { x: 2 } }),
      ]);
      expect(transitions.map((event) => [event.fromState, event.toState])).toEqual([
        [null, 'created'],
        ['created', 'running'],
        ['running', 'finished'],
      ]);
      expect(terminated).toEqual([
        expect.objectContaining({
          processType: 'doubler',
          pid: 'd-2',
          state: 'finished',
          outputs: { y: 4 },
          error: null,
        }),
      ]);
    });

    it('should report the error of an excepted process', async () => {
      const terminated: ProcessTerminatedEvent[] = [];
      eventEmitter.on(ProcessEventType.TERMINATED, (event: ProcessTerminatedEvent) =>
        terminated.push(event),
      );

      const process = await manager.launch('doubler', { x: 'two' }, { pid: 'd-3' });
      await process.whenTerminated();

      expect(terminated[0]?.state).toBe('excepted');
      expect(terminated[0]?.error).toBe(
        'Step "run" of process d-3 failed: x must be a number',
      );
    });

    it('should throw for an unknown process type', async () => {
      await expect(manager.launch('unknown')).rejects.toThrow(
        ProcessTypeNotRegisteredError,
      );
    });

    it('should refuse a pid whose launch has not finished starting', async () => {
      const first = manager.launch('approval', {}, { pid: 'a-8' });

      await expect(manager.launch('approval', {}, { pid: 'a-8' })).rejects.toThrow(
        'Process a-8 is already running',
      );
      const process = await first;
      expect(manager.get('a-8')).toBe(process);
    });

    it('should not track a process that fails to start', async () => {
      jest
        .spyOn(ApprovalProcess.prototype, 'start')
        .mockRejectedValueOnce(new Error('attach failed'));

      await expect(manager.launch('approval', {}, { pid: 'a-9' })).rejects.toThrow(
        'attach failed',
      );
      expect(manager.get('a-9')).toBeUndefined();

      const retried = await manager.launch('approval', {}, { pid: 'a-9' });
      expect(manager.get('a-9')).toBe(retried);
    });

    it('should refuse a pid that is already running', async () => {
      await manager.launch('approval', {}, { pid: 'a-1' });

      await expect(manager.launch('approval', {}, { pid: 'a-1' })).rejects.toThrow(
        'Process a-1 is already running',
      );
      expect(manager.list().map((process) => process.pid)).toEqual(['a-1']);
    });
  });

  describe('getStatus', () => {
    it('should report a live process', async () => {
      const process = await manager.launch('approval', {}, { pid: 'a-2' });
      await waitUntil(() => process.state === ProcessState.WAITING);

      await expect(manager.getStatus('a-2')).resolves.toEqual({
        pid: 'a-2',
        label: 'waiting',
        is_terminal: false,
        paused: false,
      });
    });

    it('should fall back to the checkpoint once the process is gone', async () => {
      const process = await manager.launch('approval', {}, { pid: 'a-3' });
      await waitUntil(() => process.state === ProcessState.WAITING);
      process.kill('cancelled');
      await process.flush();

      expect(manager.get('a-3')).toBeUndefined();
      await expect(manager.getStatus('a-3')).resolves.toEqual({
        pid: 'a-3',
        label: 'killed',
        is_terminal: true,
        paused: false,
      });
    });

    it('should reject for a pid that was never checkpointed', async () => {
      await expect(manager.getStatus('ghost')).rejects.toThrow(
        'No checkpoint stored for process ghost',
      );
    });
  });

  describe('continueProcess', () => {
    it('should resume a waiting process from its checkpoint on another host', async () => {
      const original = await manager.launch('approval', { amount: 3 }, { pid: 'a-4' });
      await waitUntil(() => original.state === ProcessState.WAITING);
      await original.flush();
      await manager.onModuleDestroy();

      const other = createManager(store);
      manager = other.manager;
      await manager.onModuleInit();

      const restored = await manager.continueProcess('a-4');
      expect(restored).not.toBe(original);
      expect(restored.state).toBe(ProcessState.WAITING);
      expect(manager.get('a-4')).toBe(restored);

      restored.resume('ok');
      await expect(restored.whenTerminated()).resolves.toBe(ProcessState.FINISHED);
      expect(restored.result).toEqual({ requested: true, approved: 'ok' });
      expect(manager.get('a-4')).toBeUndefined();
    });

    it('should share one reconstruction between concurrent calls', async () => {
      const original = await manager.launch('approval', {}, { pid: 'a-7' });
      await waitUntil(() => original.state === ProcessState.WAITING);
      await original.flush();
      await manager.onModuleDestroy();

      const other = createManager(store);
      manager = other.manager;
      await manager.onModuleInit();
      const loadCheckpoint = jest.spyOn(other.persister, 'loadCheckpoint');

      const [first, second] = await Promise.all([
        manager.continueProcess('a-7'),
        manager.continueProcess('a-7'),
      ]);

      expect(second).toBe(first);
      expect(loadCheckpoint).toHaveBeenCalledTimes(1);
      expect(manager.list()).toEqual([first]);

      first.resume('ok');
      await first.whenTerminated();
      expect(manager.get('a-7')).toBeUndefined();
    });

    it('should return the live instance when the process is running', async () => {
      const process = await manager.launch('approval', {}, { pid: 'a-5' });

      await expect(manager.continueProcess('a-5')).resolves.toBe(process);
    });

    it('should not track a process that had already terminated', async () => {
      const process = await manager.launch('doubler', { x: 1 }, { pid: 'd-4' });
      await process.whenTerminated();
      await process.flush();

      const restored = await manager.continueProcess('d-4');
      expect(restored.hasTerminated()).toBe(true);
      expect(restored.state).toBe(ProcessState.FINISHED);
      expect(manager.get('d-4')).toBeUndefined();
    });

    it('should resume from a tagged checkpoint', async () => {
      const bundle: ProcessBundle = {
        schema: 'process-bundle',
        version: 1,
        type_id: 'counter',
        pid: 'c-1',
        label: ProcessState.RUNNING,
        inputs: {},
        outputs: {},
        paused: false,
        continuation: { status: null, step: 'tick', args: [1] },
      };
      await store.save(bundle, 'v1');

      const restored = await manager.continueProcess('c-1', 'v1');
      await restored.whenTerminated();

      expect(restored.result).toEqual({ count: 3 });
    });
  });

  describe('checkpoint failures', () => {
    it('should emit checkpoint-failed events and keep the process going', async () => {
      await manager.onModuleDestroy();
      ({ manager, eventEmitter } = createManager(new OfflineStore()));
      const failures: ProcessCheckpointFailedEvent[] = [];
      eventEmitter.on(
        ProcessEventType.CHECKPOINT_FAILED,
        (event: ProcessCheckpointFailedEvent) => failures.push(event),
      );

      const process = await manager.launch('approval', {}, { pid: 'a-6' });
      await waitUntil(() => process.state === ProcessState.WAITING);
      await process.flush();

      expect(failures.length).toBeGreaterThan(0);
      expect(failures[0]).toEqual(
        expect.objectContaining({
          processType: 'approval',
          pid: 'a-6',
          error: 'store offline',
        }),
      );
      process.kill();
    });
  });

  describe('launcher requests', () => {
    it('should launch a process for a remote controller', async () => {
      const controller = new RemoteProcessController(broker, { timeoutMs: 1000 });

      const pid = await controller.launch('approval', { amount: 7 }, { pid: 'r-1' });

      expect(pid).toBe('r-1');
      const process = manager.get('r-1');
      expect(process).toBeInstanceOf(ApprovalProcess);
      expect(process?.inputs).toEqual({ amount: 7 });

      await expect(controller.kill('r-1', 'remote stop')).resolves.toBe(true);
      expect(process?.state).toBe(ProcessState.KILLED);
    });

    it('should continue a process for a remote controller', async () => {
      const process = await manager.launch('approval', {}, { pid: 'r-2' });
      await waitUntil(() => process.state === ProcessState.WAITING);
      const controller = new RemoteProcessController(broker, { timeoutMs: 1000 });

      await expect(controller.continueProcess('r-2')).resolves.toBe('r-2');
      expect(manager.get('r-2')).toBe(process);
    });

    it('should answer repeated CONTINUE requests with one process', async () => {
      const original = await manager.launch('approval', {}, { pid: 'r-3' });
      await waitUntil(() => original.state === ProcessState.WAITING);
      await original.flush();
      await manager.onModuleDestroy();

      const other = createManager(store);
      manager = other.manager;
      await manager.onModuleInit();
      const controller = new RemoteProcessController(other.broker, { timeoutMs: 1000 });

      await expect(
        Promise.all([
          controller.continueProcess('r-3'),
          controller.continueProcess('r-3'),
          controller.continueProcess('r-3'),
        ]),
      ).resolves.toEqual(['r-3', 'r-3', 'r-3']);

      const restored = manager.get('r-3');
      expect(restored).toBeInstanceOf(ApprovalProcess);
      expect(restored).not.toBe(original);
      expect(manager.list()).toHaveLength(1);
    });

    it('should relay launcher errors to the controller', async () => {
      const controller = new RemoteProcessController(broker, { timeoutMs: 1000 });

      const error = await controller
        .continueProcess('ghost')
        .catch((caught: unknown) => caught);

      expect(error).toBeInstanceOf(RemoteControlError);
      if (!(error instanceof RemoteControlError)) return;
      expect(error.remoteName).toBe('ReconstructionError');
      expect(error.message).toBe('No checkpoint stored for process ghost');
    });
  });
});
