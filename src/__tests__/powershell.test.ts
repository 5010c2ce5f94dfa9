import { ExecutionError } from '../core/errors';
import { encodeCommand, lastJsonLine, powershellArgs, psQuote } from '../core/powershell';
import { NetSessionProbe } from '../elevation/privilege';

describe('PowerShell helper', () => {
  it('should pass the script as UTF-16LE Base64 after -EncodedCommand', () => {
    const script = "Get-ItemProperty 'HKLM:\\SYSTEM' | ConvertTo-Json";
    const args = powershellArgs(script);

    expect(args.slice(0, 5)).toEqual(['-NoProfile', '-NonInteractive', '-ExecutionPolicy', 'Bypass', '-EncodedCommand']);
    // The command is Base64 encoded, so we decode it for inspection
    expect(Buffer.from(args[5], 'base64').toString('utf16le')).toBe(script);
    expect(args[5]).toBe(encodeCommand(script));
  });

  it('should double single quotes inside literals', () => {
    expect(psQuote("O'Brien's hub")).toBe("'O''Brien''s hub'");
    expect(psQuote('plain')).toBe("'plain'");
  });

  describe('lastJsonLine', () => {
    it('should parse only the last non-empty line', () => {
      expect(lastJsonLine('noise\r\n{"a":1}\r\n\r\n', 'test')).toEqual({ a: 1 });
    });

    it('should reject empty output and non-JSON output', () => {
      expect(() => lastJsonLine('   ', 'test')).toThrow('PowerShell produced no output');
      expect(() => lastJsonLine('{"a":1}\nDone.', 'test')).toThrow(ExecutionError);
    });
  });
});

describe('Privilege probe', () => {
  it('should count non-Windows platforms as elevated without running anything', async () => {
    expect(await new NetSessionProbe('linux').isElevated()).toBe(true);
  });
});
