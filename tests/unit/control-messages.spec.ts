import {
  ControlKind,
  buildRpcRequest,
  buildStateChanged,
  decodeBroadcast,
  decodeRpcRequest,
  decodeRpcResponse,
  errorResponse,
  isStatusReport,
  stateChangedTopic,
} from '../../src/communications/control-messages';
import { MalformedMessageError } from '../../src/errors/malformed-message.error';
import { ProcessState } from '../../src/process/process-states';

describe('control messages', () => {
  it('builds state-changed broadcasts on the process topic', () => {
    expect(stateChangedTopic('p-1')).toBe('process.state_changed.p-1');
    expect(buildStateChanged('p-1', null, ProcessState.CREATED)).toEqual({
      type: 'broadcast',
      kind: 'STATE_CHANGED',
      pid: 'p-1',
      payload: { from: null, to: 'created' },
    });
  });

  describe('decodeRpcRequest', () => {
    it('accepts a request and defaults its payload', () => {
      expect(
        decodeRpcRequest({ type: 'rpc', kind: 'PLAY', pid: 'p-1', correlation_id: 'c-1' }),
      ).toEqual(buildRpcRequest(ControlKind.PLAY, 'p-1', 'c-1', {}));
    });

    it('rejects unknown kinds and missing fields', () => {
      expect(() =>
        decodeRpcRequest({ type: 'rpc', kind: 'JUMP', pid: 'p-1', correlation_id: 'c-1' }),
      ).toThrow('Unknown control kind: JUMP');
      expect(() =>
        decodeRpcRequest({ type: 'rpc', kind: 'PLAY', correlation_id: 'c-1' }),
      ).toThrow('RPC request is missing pid');
      expect(() => decodeRpcRequest({ type: 'rpc', kind: 'PLAY', pid: 'p-1' })).toThrow(
        'RPC request is missing correlation_id',
      );
      expect(() =>
        decodeRpcRequest({
          type: 'rpc',
          kind: 'PLAY',
          pid: 'p-1',
          correlation_id: 'c-1',
          payload: [],
        }),
      ).toThrow('RPC payload must be an object');
      expect(() => decodeRpcRequest({ type: 'broadcast' })).toThrow(MalformedMessageError);
    });
  });

  describe('decodeBroadcast', () => {
    it('accepts a broadcast', () => {
      expect(
        decodeBroadcast({ type: 'broadcast', kind: 'KILL', pid: '*', payload: { message: 'x' } }),
      ).toEqual({ type: 'broadcast', kind: 'KILL', pid: '*', payload: { message: 'x' } });
    });

    it('rejects requests posing as broadcasts', () => {
      expect(() => decodeBroadcast({ type: 'rpc', kind: 'KILL', pid: '*' })).toThrow(
        'Expected a broadcast envelope',
      );
    });
  });

  describe('decodeRpcResponse', () => {
    it('returns ok and error responses', () => {
      expect(
        decodeRpcResponse({ correlation_id: 'c-1', status: 'ok', result: 3 }, 'c-1'),
      ).toEqual({ correlation_id: 'c-1', status: 'ok', result: 3 });
      expect(decodeRpcResponse(errorResponse('c-1', new TypeError('bad')), 'c-1')).toEqual({
        correlation_id: 'c-1',
        status: 'error',
        error_detail: { name: 'TypeError', message: 'bad' },
      });
    });

    it('rejects a response to another request', () => {
      expect(() =>
        decodeRpcResponse({ correlation_id: 'c-2', status: 'ok', result: 3 }, 'c-1'),
      ).toThrow('Response correlation id c-2 does not match c-1');
    });

    it('rejects unknown statuses and error responses without detail', () => {
      expect(() => decodeRpcResponse({ correlation_id: 'c-1', status: 'maybe' }, 'c-1')).toThrow(
        'Unknown response status: maybe',
      );
      expect(() => decodeRpcResponse({ correlation_id: 'c-1', status: 'error' }, 'c-1')).toThrow(
        'Error response is missing error_detail',
      );
    });
  });

  it('describes non-error failures in error responses', () => {
    expect(errorResponse('c-1', 'plain')).toEqual({
      correlation_id: 'c-1',
      status: 'error',
      error_detail: { name: 'Error', message: 'plain' },
    });
  });

  it('recognizes status reports', () => {
    expect(
      isStatusReport({ pid: 'p-1', label: 'running', is_terminal: false, paused: false }),
    ).toBe(true);
    expect(
      isStatusReport({ pid: 'p-1', label: 'asleep', is_terminal: false, paused: false }),
    ).toBe(false);
  });
});
