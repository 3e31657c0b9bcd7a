import { ReconstructionError } from '../../src/errors/reconstruction.error';
import { hydrateBundle } from '../../src/utils/hydrate-bundle';

function validBundle(): Record<string, unknown> {
  return {
    schema: 'process-bundle',
    version: 1,
    type_id: 'doubler',
    pid: 'p-1',
    label: 'running',
    inputs: { x: 5 },
    outputs: {},
    paused: false,
    continuation: { status: null, step: 'run', args: [] },
  };
}

describe('hydrateBundle', () => {
  it('returns a copy of a valid bundle', () => {
    const raw = validBundle();
    const bundle = hydrateBundle(raw);

    expect(bundle).toEqual(raw);
    expect(bundle.inputs).not.toBe(raw.inputs);
  });

  it('rejects values that are not objects', () => {
    expect(() => hydrateBundle('nope')).toThrow(
      new ReconstructionError(null, 'Bundle is not an object'),
    );
    expect(() => hydrateBundle([])).toThrow('Bundle is not an object');
  });

  it('requires a pid', () => {
    expect(() => hydrateBundle({ ...validBundle(), pid: '' })).toThrow(
      'Bundle is missing its pid',
    );
  });

  it('rejects other schemas and versions', () => {
    expect(() => hydrateBundle({ ...validBundle(), version: 2 })).toThrow(
      'Bundle for process p-1 is not a supported V1 process bundle',
    );
    expect(() => hydrateBundle({ ...validBundle(), schema: 'snapshot' })).toThrow(
      'Bundle for process p-1 is not a supported V1 process bundle',
    );
  });

  it('rejects unknown labels', () => {
    expect(() => hydrateBundle({ ...validBundle(), label: 'sleeping' })).toThrow(
      'Bundle for process p-1 has invalid label sleeping',
    );
  });

  it('rejects a missing type id and paused flag', () => {
    expect(() => hydrateBundle({ ...validBundle(), type_id: 3 })).toThrow(
      'Bundle for process p-1 has no type id',
    );
    expect(() => hydrateBundle({ ...validBundle(), paused: 'no' })).toThrow(
      'Bundle for process p-1 has invalid paused flag',
    );
  });

  it('rejects sections that are not plain JSON objects', () => {
    expect(() => hydrateBundle({ ...validBundle(), outputs: [1] })).toThrow(
      'Bundle for process p-1 has invalid outputs payload',
    );
    expect(() =>
      hydrateBundle({ ...validBundle(), inputs: { when: new Date(0) } }),
    ).toThrow(
      new ReconstructionError(
        'p-1',
        'Cannot serialize process p-1 at inputs.when: instance of Date is not representable',
      ),
    );
  });
});
