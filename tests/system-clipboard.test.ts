import { describe, it, expect, vi, beforeEach } from 'vitest';

// ─── Mocks ───
const exec = vi.hoisted(() => {
  const calls: Array<{ command: string; timeout: number | undefined }> = [];
  return { outputs: new Map<string, string | Error>(), calls };
});

vi.mock('child_process', () => ({
  execFile: vi.fn(
    (
      file: string,
      args: string[],
      options: { timeout?: number },
      callback: (error: Error | null, stdout: Buffer) => void,
    ) => {
      const command =
        file === 'powershell'
          ? `powershell ${Buffer.from(args[args.length - 1] ?? '', 'base64')
              .toString('utf16le')
              .replace('[Console]::OutputEncoding = [Text.Encoding]::UTF8; ', '')}`
          : [file, ...args].join(' ');
      exec.calls.push({ command, timeout: options.timeout });

      const output = exec.outputs.get(command);
      if (output === undefined) {
        callback(new Error(`no output scripted for ${command}`), Buffer.alloc(0));
      } else if (output instanceof Error) {
        callback(output, Buffer.alloc(0));
      } else {
        callback(null, Buffer.from(output, 'utf8'));
      }
    },
  ),
}));

vi.mock('../src/main/services/logger', () => ({
  createLogger: vi.fn(() => ({
    info: vi.fn(), warn: vi.fn(), error: vi.fn(), debug: vi.fn(),
  })),
}));

import { SystemClipboardSource, parseUriList } from '../src/main/services/system-clipboard';
import { ReadFailureError } from '../src/shared/types';

const XCLIP = 'xclip -selection clipboard -o -t';

beforeEach(() => {
  exec.outputs.clear();
  exec.calls.length = 0;
});

// =============================================================================
// parseUriList
// =============================================================================
describe('parseUriList', () => {
  it('keeps file URIs and drops comments and other schemes', () => {
    const body = '# copied by the file manager\r\nfile:///home/user/a%20b.txt\r\nhttps://example.com/x\r\n\r\nfile:///tmp/c.png\r\n';
    expect(parseUriList(body)).toEqual(['/home/user/a b.txt', '/tmp/c.png']);
  });

  it('skips file URIs with a remote host', () => {
    expect(parseUriList('file://server/share/doc.txt\nfile:///tmp/ok.txt')).toEqual(['/tmp/ok.txt']);
  });
});

// =============================================================================
// Linux
// =============================================================================
describe('linux', () => {
  const source = new SystemClipboardSource({ platform: 'linux', timeoutMs: 750 });

  it('reads html and text targets', async () => {
    exec.outputs.set(`${XCLIP} TARGETS`, 'TARGETS\nUTF8_STRING\ntext/html\n');
    exec.outputs.set(`${XCLIP} text/html`, '<b>hi</b>');
    exec.outputs.set(`${XCLIP} UTF8_STRING`, 'hi');

    expect(await source.read()).toEqual({ html: '<b>hi</b>', text: 'hi' });
    expect(exec.calls.map((c) => c.timeout)).toEqual([750, 750, 750]);
  });

  it('reads a file list from text/uri-list', async () => {
    exec.outputs.set(`${XCLIP} TARGETS`, 'text/uri-list\ntext/plain');
    exec.outputs.set(`${XCLIP} text/uri-list`, 'file:///home/user/notes.md\n');
    exec.outputs.set(`${XCLIP} text/plain`, '/home/user/notes.md');

    expect(await source.read()).toEqual({ files: ['/home/user/notes.md'], text: '/home/user/notes.md' });
  });

  it('reads png image data', async () => {
    exec.outputs.set(`${XCLIP} TARGETS`, 'image/png');
    exec.outputs.set(`${XCLIP} image/png`, 'png-bytes');

    const snapshot = await source.read();

    expect(snapshot?.image?.mimeType).toBe('image/png');
    expect(snapshot?.image?.data.toString('utf8')).toBe('png-bytes');
    expect(snapshot?.text).toBeUndefined();
  });

  it('returns null for an empty clipboard', async () => {
    exec.outputs.set(`${XCLIP} TARGETS`, '\n');

    expect(await source.read()).toBeNull();
  });

  it('reports a failing tool as a read failure', async () => {
    exec.outputs.set(`${XCLIP} TARGETS`, new Error('spawn xclip ENOENT'));

    const read = source.read();

    await expect(read).rejects.toBeInstanceOf(ReadFailureError);
    await expect(read).rejects.toThrow('xclip failed: spawn xclip ENOENT');
  });
});

// =============================================================================
// macOS
// =============================================================================
describe('darwin', () => {
  const source = new SystemClipboardSource({ platform: 'darwin' });

  it('reads text and rtf', async () => {
    exec.outputs.set('pbpaste', 'hello');
    exec.outputs.set('pbpaste -Prefer rtf', '{\\rtf1 hello}');

    expect(await source.read()).toEqual({ text: 'hello', rtf: '{\\rtf1 hello}' });
  });

  it('ignores the rtf flavor when the clipboard holds only text', async () => {
    exec.outputs.set('pbpaste', 'hello');
    exec.outputs.set('pbpaste -Prefer rtf', 'hello');

    expect(await source.read()).toEqual({ text: 'hello' });
  });

  it('returns null for an empty clipboard', async () => {
    exec.outputs.set('pbpaste', '');
    exec.outputs.set('pbpaste -Prefer rtf', '');

    expect(await source.read()).toBeNull();
  });
});

// =============================================================================
// Windows
// =============================================================================
describe('win32', () => {
  const source = new SystemClipboardSource({ platform: 'win32' });
  const FILES = 'powershell Get-Clipboard -Format FileDropList | ForEach-Object { $_.FullName }';
  const TEXT = 'powershell Get-Clipboard -Raw';

  it('reads a file drop list', async () => {
    exec.outputs.set(FILES, 'C:\\Users\\me\\a.txt\r\nC:\\Users\\me\\b.txt\r\n');

    expect(await source.read()).toEqual({ files: ['C:\\Users\\me\\a.txt', 'C:\\Users\\me\\b.txt'] });
    expect(exec.calls).toHaveLength(1);
  });

  it('falls back to text without the trailing newline', async () => {
    exec.outputs.set(FILES, '');
    exec.outputs.set(TEXT, 'line one\r\nline two\r\n');

    expect(await source.read()).toEqual({ text: 'line one\r\nline two' });
  });

  it('returns null for an empty clipboard', async () => {
    exec.outputs.set(FILES, '');
    exec.outputs.set(TEXT, '');

    expect(await source.read()).toBeNull();
  });
});

describe('unsupported platforms', () => {
  it('rejects reads', async () => {
    const source = new SystemClipboardSource({ platform: 'aix' });

    await expect(source.read()).rejects.toThrow('Clipboard access is not supported on aix');
    expect(exec.calls).toHaveLength(0);
  });
});
