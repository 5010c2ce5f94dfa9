import { runPowerShell } from '../core/powershell';
import {
  EnumerationUnavailableError,
  ExecutionError,
  RegistryWriteError,
  WriteDeniedError
} from '../core/errors';
import { PowerShellRegistryStore, WRITE_CHUNK_SIZE } from '../store/powershell_store';

jest.mock('../core/powershell', () => ({
  ...jest.requireActual<typeof import('../core/powershell')>('../core/powershell'),
  runPowerShell: jest.fn()
}));

const ROOT = 'SYSTEM\\CurrentControlSet\\Enum\\USB';
const KEY = `${ROOT}\\VID_046D&PID_C52B\\6&2b1c&0&2\\Device Parameters`;

describe('PowerShell registry store', () => {
  const mockRun = jest.mocked(runPowerShell);
  const store = new PowerShellRegistryStore(20000);

  beforeEach(() => {
    jest.clearAllMocks();
  });

  describe('enumerate', () => {
    it('should return the records the script prints', async () => {
      const devices = [{
        keyPath: KEY,
        parentPath: KEY.replace(/\\Device Parameters$/, ''),
        attributes: { FriendlyName: 'Receiver', Class: 'USB' },
        sleepValue: 1
      }];
      // Progress noise before the JSON line is ignored
      mockRun.mockResolvedValue(`WARNING: slow\r\n${JSON.stringify({ ok: true, devices })}`);

      expect(await store.enumerate(ROOT)).toEqual(devices);

      const [script, timeoutMs, source] = mockRun.mock.calls[0];
      expect(script).toContain(`$rootPath = 'SYSTEM\\CurrentControlSet\\Enum\\USB'`);
      expect(script).toContain(`'Device Parameters'`);
      expect(script).toContain(`'EnhancedPowerManagementEnabled'`);
      expect(timeoutMs).toBe(20000);
      expect(source).toBe('store.enumerate');
    });

    it('should fail the pass when the root cannot be opened', async () => {
      mockRun.mockResolvedValue(JSON.stringify({ ok: false, code: 'denied', message: 'Requested registry access is not allowed.' }));

      await expect(store.enumerate(ROOT)).rejects.toThrow(
        `Cannot enumerate "${ROOT}": Requested registry access is not allowed.`
      );
    });

    it('should fail the pass when PowerShell itself fails', async () => {
      mockRun.mockRejectedValue(new ExecutionError('store.enumerate', 'powershell.exe not found'));
      await expect(store.enumerate(ROOT)).rejects.toBeInstanceOf(EnumerationUnavailableError);
    });

    it('should fail the pass on output that is not the expected shape', async () => {
      mockRun.mockResolvedValue(JSON.stringify({ ok: true, devices: [{ keyPath: 7 }] }));
      await expect(store.enumerate(ROOT)).rejects.toBeInstanceOf(EnumerationUnavailableError);

      mockRun.mockResolvedValue('');
      await expect(store.enumerate(ROOT)).rejects.toThrow('PowerShell produced no output');
    });
  });

  describe('readDword', () => {
    it('should return the integer value or null', async () => {
      mockRun.mockResolvedValueOnce('{"ok":true,"value":0}').mockResolvedValueOnce('{"ok":true,"value":null}');

      expect(await store.readDword(KEY, 'EnhancedPowerManagementEnabled')).toBe(0);
      expect(await store.readDword(KEY, 'EnhancedPowerManagementEnabled')).toBeNull();
    });

    it('should raise an execution error on a failure reply', async () => {
      mockRun.mockResolvedValue('{"ok":false,"code":"error","message":"The handle is invalid."}');
      await expect(store.readDword(KEY, 'EnhancedPowerManagementEnabled')).rejects.toBeInstanceOf(ExecutionError);
    });
  });

  describe('writeDword', () => {
    it('should write a DWORD with the value inlined', async () => {
      mockRun.mockResolvedValue('{"ok":true,"code":"","message":""}');

      await store.writeDword(KEY, 'EnhancedPowerManagementEnabled', 0);

      const [script] = mockRun.mock.calls[0];
      expect(script).toContain(`Write-Dword '${KEY}' 'EnhancedPowerManagementEnabled' 0 | ConvertTo-Json -Compress`);
      expect(script).toContain('OpenSubKey($path, $true)');
      expect(script).toContain('SetValue($name, $value, [Microsoft.Win32.RegistryValueKind]::DWord)');
    });

    it('should raise WriteDeniedError when the ACL refuses', async () => {
      mockRun.mockResolvedValue('{"ok":false,"code":"denied","message":"Requested registry access is not allowed."}');

      const write = store.writeDword(KEY, 'EnhancedPowerManagementEnabled', 0);
      await expect(write).rejects.toBeInstanceOf(WriteDeniedError);
      await expect(write).rejects.toThrow('Requested registry access is not allowed.');
    });

    it('should recognise a denial by its message', async () => {
      mockRun.mockResolvedValue('{"ok":false,"code":"error","message":"Access is denied."}');
      await expect(store.writeDword(KEY, 'EnhancedPowerManagementEnabled', 1)).rejects.toBeInstanceOf(WriteDeniedError);
    });

    it('should raise RegistryWriteError for anything else', async () => {
      mockRun.mockResolvedValue('{"ok":false,"code":"missing","message":"Key not found"}');
      await expect(store.writeDword(KEY, 'EnhancedPowerManagementEnabled', 1)).rejects.toBeInstanceOf(RegistryWriteError);

      mockRun.mockRejectedValue(new ExecutionError('store.writeDword', 'boom'));
      await expect(store.writeDword(KEY, 'EnhancedPowerManagementEnabled', 1)).rejects.toThrow('boom');
    });
  });

  describe('writeDwords', () => {
    const OTHER = KEY.replace('VID_046D&PID_C52B', 'VID_1234&PID_0001');
    const write = (keyPath: string, value: number) => ({ keyPath, name: 'EnhancedPowerManagementEnabled', value });

    it('should write a batch in one script with one result per write', async () => {
      mockRun.mockResolvedValue(JSON.stringify({
        ok: true,
        results: [
          { ok: true, code: '', message: '' },
          { ok: false, code: 'denied', message: 'Requested registry access is not allowed.' }
        ]
      }));

      const results = await store.writeDwords([write(KEY, 0), write(OTHER, 1)]);

      expect(mockRun).toHaveBeenCalledTimes(1);
      const [script, timeoutMs, source] = mockRun.mock.calls[0];
      expect(script).toContain(`[void]$results.Add((Write-Dword '${KEY}' 'EnhancedPowerManagementEnabled' 0))`);
      expect(script).toContain(`[void]$results.Add((Write-Dword '${OTHER}' 'EnhancedPowerManagementEnabled' 1))`);
      expect(timeoutMs).toBe(20000);
      expect(source).toBe('store.writeDwords');

      expect(results[0]).toEqual({ keyPath: KEY, error: null });
      expect(results[1].keyPath).toBe(OTHER);
      expect(results[1].error).toBeInstanceOf(WriteDeniedError);
      expect(results[1].error?.message).toBe('Requested registry access is not allowed.');
    });

    it('should split large batches into chunks', async () => {
      const writes = Array.from({ length: WRITE_CHUNK_SIZE + 5 }, (_, i) => write(`${KEY}${i}`, 0));
      mockRun.mockImplementation(async script => {
        const count = script.split('[void]$results.Add(').length - 1;
        return JSON.stringify({ ok: true, results: Array.from({ length: count }, () => ({ ok: true, code: '', message: '' })) });
      });

      const results = await store.writeDwords(writes);

      expect(mockRun).toHaveBeenCalledTimes(2);
      expect(results.map(r => r.keyPath)).toEqual(writes.map(w => w.keyPath));
      expect(results.every(r => r.error === null)).toBe(true);
    });

    it('should fail every write in a chunk when PowerShell fails', async () => {
      mockRun.mockRejectedValue(new ExecutionError('store.writeDwords', 'powershell.exe not found'));

      const results = await store.writeDwords([write(KEY, 0), write(OTHER, 0)]);

      expect(results.map(r => r.keyPath)).toEqual([KEY, OTHER]);
      for (const { error } of results) {
        expect(error).toBeInstanceOf(RegistryWriteError);
        expect(error?.message).toBe('powershell.exe not found');
      }
    });

    it('should fail the chunk when the reply has the wrong number of results', async () => {
      mockRun.mockResolvedValue(JSON.stringify({ ok: true, results: [{ ok: true, code: '', message: '' }] }));

      const results = await store.writeDwords([write(KEY, 0), write(OTHER, 0)]);

      expect(results[0].error?.message).toBe('expected 2 results, got 1');
      expect(results[1].error).toBeInstanceOf(RegistryWriteError);
    });
  });

  it('should quote single quotes in key paths', async () => {
    mockRun.mockResolvedValue('{"ok":true,"value":1}');
    await store.readDword("SYSTEM\\X\\O'Brien\\Device Parameters", 'EnhancedPowerManagementEnabled');

    expect(mockRun.mock.calls[0][0]).toContain(`OpenSubKey('SYSTEM\\X\\O''Brien\\Device Parameters')`);
  });
});
