import { UnknownConsentRequestError } from '../core/errors';
import { ConsentGate } from '../elevation/consent';
import { FileElevationChannel } from '../elevation/channel';
import { PrivilegeBroker } from '../elevation/privilege_broker';
import { FixedProbe, InProcessLauncher, MemoryRegistryStore, keyPathFor } from './helpers/fakes';

const A = keyPathFor('VID_0001');
const B = keyPathFor('VID_0002');

describe('Consent gate', () => {
  it('should park a request until it is answered', async () => {
    const gate = new ConsentGate(5000);
    const seen: string[] = [];
    gate.onRequest(request => seen.push(request.id));

    const answer = gate.confirm([{ registryPath: A, value: 0 }]);
    const [request] = gate.pending();

    expect(request.operations).toEqual([{ registryPath: A, value: 0 }]);
    expect(seen).toEqual([request.id]);

    gate.answer(request.id, true);
    expect(await answer).toBe(true);
    expect(gate.pending()).toEqual([]);
  });

  it('should decline a request nobody answers in time', async () => {
    const gate = new ConsentGate(20);
    expect(await gate.confirm([{ registryPath: A, value: 0 }])).toBe(false);
    expect(gate.pending()).toEqual([]);
  });

  it('should reject an answer for an unknown request', () => {
    const gate = new ConsentGate(5000);
    expect(() => gate.answer('nope', true)).toThrow(UnknownConsentRequestError);
  });

  it('should decline everything waiting on close', async () => {
    const gate = new ConsentGate(5000);
    const first = gate.confirm([{ registryPath: A, value: 0 }]);
    const second = gate.confirm([{ registryPath: B, value: 1 }]);

    gate.close();

    expect(await Promise.all([first, second])).toEqual([false, false]);
  });

  it('should keep notifying listeners after one throws', () => {
    const gate = new ConsentGate(5000);
    const calls: number[] = [];
    gate.onRequest(() => {
      throw new Error('listener broke');
    });
    gate.onRequest(() => calls.push(1));

    void gate.confirm([{ registryPath: A, value: 0 }]);
    gate.close();

    expect(calls).toEqual([1]);
  });

  describe('as the broker hook', () => {
    let store: MemoryRegistryStore;
    let gate: ConsentGate;
    let launcher: InProcessLauncher;
    let broker: PrivilegeBroker;

    beforeEach(() => {
      store = new MemoryRegistryStore().add(A, { FriendlyName: 'A' }, 1);
      gate = new ConsentGate(5000);
      launcher = new InProcessLauncher(store);
      broker = new PrivilegeBroker(new FixedProbe(false), {
        store,
        channel: new FileElevationChannel(launcher),
        elevationTimeoutMs: 5000,
        confirmElevation: gate.confirm
      });
    });

    it('should launch the helper once the operator approves', async () => {
      gate.onRequest(request => gate.answer(request.id, true));

      expect(await broker.requestWrite([{ registryPath: A, value: 0 }])).toEqual([
        { registryPath: A, value: 0, status: 'Succeeded' }
      ]);
      expect(launcher.started).toBe(1);
      expect(store.value(A)).toBe(0);
    });

    it('should fail the batch as declined without launching when the operator refuses', async () => {
      gate.onRequest(request => gate.answer(request.id, false));

      const [outcome] = await broker.requestWrite([{ registryPath: A, value: 0 }]);

      expect(outcome).toMatchObject({ status: 'Failed', reason: 'declined' });
      expect(launcher.started).toBe(0);
      expect(store.value(A)).toBe(1);
    });
  });
});
