import { runPowerShell } from '../core/powershell';
import { ExecutionError, TimeoutError } from '../core/errors';
import { PowerShellRunAsLauncher, runAsScript } from '../elevation/launcher';

jest.mock('../core/powershell', () => ({
  ...jest.requireActual<typeof import('../core/powershell')>('../core/powershell'),
  runPowerShell: jest.fn()
}));

describe('RunAs launcher', () => {
  const mockRun = jest.mocked(runPowerShell);
  const launcher = new PowerShellRunAsLauncher({
    nodePath: 'C:\\Program Files\\nodejs\\node.exe',
    executorScript: 'C:\\svc\\dist\\elevation\\executor_main.js'
  });

  beforeEach(() => {
    jest.clearAllMocks();
  });

  it('should start node with the executor and both files behind the consent prompt', async () => {
    mockRun.mockResolvedValue('{"launched":true,"exitCode":0}');

    const result = await launcher.launch('C:\\Temp\\usb-sleep-1\\request.json', 'C:\\Temp\\usb-sleep-1\\response.json', 75000);

    expect(result).toEqual({ status: 'exited', exitCode: 0 });
    const [script, timeoutMs] = mockRun.mock.calls[0];
    expect(timeoutMs).toBe(75000);
    expect(script).toContain("-FilePath 'C:\\Program Files\\nodejs\\node.exe'");
    expect(script).toContain(
      `-ArgumentList @('"C:\\svc\\dist\\elevation\\executor_main.js"', '"C:\\Temp\\usb-sleep-1\\request.json"', '"C:\\Temp\\usb-sleep-1\\response.json"')`
    );
    expect(script).toContain('-Verb RunAs');
  });

  it('should report a dismissed prompt as declined', async () => {
    mockRun.mockResolvedValue('{"launched":false,"declined":true,"message":"The operation was canceled by the user."}');
    expect(await launcher.launch('req', 'res', 1000)).toEqual({
      status: 'declined',
      message: 'The operation was canceled by the user.'
    });
  });

  it('should report other start failures as spawn errors', async () => {
    mockRun.mockResolvedValue('{"launched":false,"declined":false,"message":"The system cannot find the file specified."}');
    expect(await launcher.launch('req', 'res', 1000)).toEqual({
      status: 'spawn-error',
      message: 'The system cannot find the file specified.'
    });

    mockRun.mockRejectedValue(new ExecutionError('elevation.launch', 'powershell.exe not found'));
    expect(await launcher.launch('req', 'res', 1000)).toEqual({ status: 'spawn-error', message: 'powershell.exe not found' });
  });

  it('should report a helper that outlives the timeout', async () => {
    mockRun.mockRejectedValue(new TimeoutError('elevation.launch', 1000));
    expect(await launcher.launch('req', 'res', 1000)).toEqual({ status: 'timeout' });
  });

  it('should not trust a reply of the wrong shape', async () => {
    mockRun.mockResolvedValue('{"launched":"maybe"}');
    const result = await launcher.launch('req', 'res', 1000);

    expect(result.status).toBe('spawn-error');
  });

  it('should map the cancelled-by-user error code to declined', () => {
    expect(runAsScript('node.exe', [])).toContain('($native -eq 1223)');
  });
});
