import { promises as fs } from 'fs';
import * as os from 'os';
import * as path from 'path';
import { FileElevationChannel } from '../elevation/channel';
import { InProcessLauncher, MemoryRegistryStore, ScriptedLauncher, keyPathFor } from './helpers/fakes';

const A = keyPathFor('VID_0001');
const B = keyPathFor('VID_0002');
const OPS = [
  { registryPath: A, value: 0 as const },
  { registryPath: B, value: 0 as const }
];

describe('File elevation channel', () => {
  let tmpRoot: string;
  let store: MemoryRegistryStore;

  beforeEach(async () => {
    tmpRoot = await fs.mkdtemp(path.join(os.tmpdir(), 'channel-test-'));
    store = new MemoryRegistryStore()
      .add(A, { FriendlyName: 'A' }, 1)
      .add(B, { FriendlyName: 'B' }, 1);
  });

  afterEach(async () => {
    await fs.rm(tmpRoot, { recursive: true, force: true });
  });

  it('should return one outcome per operation from the helper report', async () => {
    store.denied.add(B);
    const launcher = new InProcessLauncher(store);
    const channel = new FileElevationChannel(launcher, tmpRoot);

    const trip = await channel.roundTrip(OPS, 5000);

    expect(trip).toEqual({
      kind: 'report',
      outcomes: [
        { registryPath: A, value: 0, status: 'Succeeded' },
        { registryPath: B, value: 0, status: 'Failed', reason: 'denied', message: `Access denied: "${B}"` }
      ]
    });
    expect(launcher.started).toBe(1);
    expect(store.value(A)).toBe(0);
  });

  it('should remove its temp files afterwards', async () => {
    await new FileElevationChannel(new InProcessLauncher(store), tmpRoot).roundTrip(OPS, 5000);
    expect(await fs.readdir(tmpRoot)).toEqual([]);
  });

  it('should remove the temp directory when the request cannot be written', async () => {
    const writeFile = jest.spyOn(fs, 'writeFile').mockRejectedValueOnce(new Error('ENOSPC: no space left on device'));
    const launcher = new ScriptedLauncher({ status: 'exited', exitCode: 0 });
    try {
      const trip = await new FileElevationChannel(launcher, tmpRoot).roundTrip(OPS, 5000);

      expect(trip).toEqual({
        kind: 'spawn-error',
        message: 'Cannot stage elevation request: ENOSPC: no space left on device'
      });
      expect(launcher.started).toBe(0);
      expect(await fs.readdir(tmpRoot)).toEqual([]);
    } finally {
      writeFile.mockRestore();
    }
  });

  it('should report a declined consent prompt', async () => {
    const channel = new FileElevationChannel(
      new ScriptedLauncher({ status: 'declined', message: 'The operation was canceled by the user.' }),
      tmpRoot
    );

    expect(await channel.roundTrip(OPS, 5000)).toEqual({
      kind: 'declined',
      message: 'The operation was canceled by the user.'
    });
  });

  it('should report a helper that could not be started', async () => {
    const channel = new FileElevationChannel(new ScriptedLauncher({ status: 'spawn-error', message: 'not found' }), tmpRoot);
    expect(await channel.roundTrip(OPS, 5000)).toEqual({ kind: 'spawn-error', message: 'not found' });
  });

  it('should treat a launcher that throws as a spawn error', async () => {
    const channel = new FileElevationChannel(new ScriptedLauncher('throw'), tmpRoot);
    expect(await channel.roundTrip(OPS, 5000)).toEqual({ kind: 'spawn-error', message: 'spawn EACCES' });
  });

  it('should resolve to no-response when the helper exits without a report', async () => {
    const channel = new FileElevationChannel(new ScriptedLauncher({ status: 'exited', exitCode: 1 }), tmpRoot);

    expect(await channel.roundTrip(OPS, 5000)).toEqual({
      kind: 'no-response',
      message: 'Elevated helper exited (code 1) without a report'
    });
    expect(await fs.readdir(tmpRoot)).toEqual([]);
  });

  it('should resolve to no-response when the helper never finishes', async () => {
    const channel = new FileElevationChannel(new ScriptedLauncher('never'), tmpRoot);

    expect(await channel.roundTrip(OPS, 50)).toEqual({
      kind: 'no-response',
      message: 'Elevated helper did not finish within 50ms'
    });
  });

  it('should resolve to no-response when the launcher gives up waiting', async () => {
    const channel = new FileElevationChannel(new ScriptedLauncher({ status: 'timeout' }), tmpRoot);
    expect(await channel.roundTrip(OPS, 5000)).toEqual({
      kind: 'no-response',
      message: 'Elevated helper did not finish within 5000ms'
    });
  });

  it('should resolve to no-response when the report is malformed', async () => {
    const channel = new FileElevationChannel(new ScriptedLauncher({ status: 'exited', exitCode: 0 }, 'not json'), tmpRoot);
    const trip = await channel.roundTrip(OPS, 5000);

    expect(trip.kind).toBe('no-response');
  });

  it('should resolve to no-response when the report answers another request', async () => {
    const stale = JSON.stringify({ version: 1, requestId: 'stale-request', outcomes: [] });
    const channel = new FileElevationChannel(new ScriptedLauncher({ status: 'exited', exitCode: 0 }, stale), tmpRoot);

    expect(await channel.roundTrip(OPS, 5000)).toEqual({
      kind: 'no-response',
      message: 'Elevation response answers a different request'
    });
  });
});
