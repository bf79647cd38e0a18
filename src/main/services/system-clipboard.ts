/**
 * SystemClipboardSource — reads the OS clipboard through platform tools.
 *
 * - Linux: xclip (X11 selection "clipboard"), one call per target
 * - macOS: pbpaste (plain text, RTF when offered)
 * - Windows: PowerShell Get-Clipboard (text, file drop list)
 *
 * Every call is bounded by `timeoutMs`; a missing tool, a non-zero exit or a
 * timeout surfaces as ReadFailureError so the monitor skips the tick.
 *
 * @module system-clipboard
 */

import { execFile } from 'child_process';
import { fileURLToPath } from 'url';
import { createLogger } from './logger';
import { ReadFailureError } from '@shared/types';
import type { ClipboardSnapshot } from '@shared/types';
import type { ClipboardSource } from './clipboard-monitor';

const log = createLogger('SystemClipboard');

const MAX_BUFFER = 64 * 1024 * 1024;

export interface SystemClipboardOptions {
  platform: NodeJS.Platform;
  /** Per-command timeout (ms) */
  timeoutMs: number;
}

/** Parse a text/uri-list body into local paths; non-file URIs are dropped */
export function parseUriList(body: string): string[] {
  const paths: string[] = [];
  for (const line of body.split(/\r?\n/)) {
    const entry = line.trim();
    if (!entry || entry.startsWith('#') || !entry.startsWith('file://')) continue;
    try {
      paths.push(fileURLToPath(entry));
    } catch (err) {
      log.debug(`Skipping malformed file URI "${entry}":`, err instanceof Error ? err.message : String(err));
    }
  }
  return paths;
}

export class SystemClipboardSource implements ClipboardSource {
  private readonly options: SystemClipboardOptions;

  constructor(options: Partial<SystemClipboardOptions> = {}) {
    this.options = {
      platform: process.platform,
      timeoutMs: 1000,
      ...options,
    };
  }

  async read(): Promise<ClipboardSnapshot | null> {
    switch (this.options.platform) {
      case 'linux':
        return this.readX11();
      case 'darwin':
        return this.readMac();
      case 'win32':
        return this.readWindows();
      default:
        throw new ReadFailureError(`Clipboard access is not supported on ${this.options.platform}`);
    }
  }

  // ─── Linux ───

  private async readX11(): Promise<ClipboardSnapshot | null> {
    const targets = new Set(
      (await this.xclip('TARGETS'))
        .toString('utf8')
        .split(/\r?\n/)
        .map((t) => t.trim())
        .filter(Boolean),
    );
    if (targets.size === 0) return null;

    const snapshot: ClipboardSnapshot = {};

    if (targets.has('text/uri-list')) {
      const files = parseUriList((await this.xclip('text/uri-list')).toString('utf8'));
      if (files.length > 0) snapshot.files = files;
    }
    if (targets.has('image/png')) {
      snapshot.image = { data: await this.xclip('image/png'), mimeType: 'image/png' };
    }
    if (targets.has('text/html')) {
      snapshot.html = (await this.xclip('text/html')).toString('utf8');
    }
    const textTarget = ['UTF8_STRING', 'text/plain;charset=utf-8', 'text/plain', 'STRING'].find((t) => targets.has(t));
    if (textTarget) {
      snapshot.text = (await this.xclip(textTarget)).toString('utf8');
    }

    return snapshot;
  }

  private xclip(target: string): Promise<Buffer> {
    return this.run('xclip', ['-selection', 'clipboard', '-o', '-t', target]);
  }

  // ─── macOS ───

  private async readMac(): Promise<ClipboardSnapshot | null> {
    const text = (await this.run('pbpaste', [])).toString('utf8');
    const rich = (await this.run('pbpaste', ['-Prefer', 'rtf'])).toString('utf8');

    const snapshot: ClipboardSnapshot = {};
    if (text) snapshot.text = text;
    if (rich.startsWith('{\\rtf')) snapshot.rtf = rich;
    return snapshot.text === undefined && snapshot.rtf === undefined ? null : snapshot;
  }

  // ─── Windows ───

  private async readWindows(): Promise<ClipboardSnapshot | null> {
    const files = (await this.powershell('Get-Clipboard -Format FileDropList | ForEach-Object { $_.FullName }'))
      .split(/\r?\n/)
      .map((p) => p.trim())
      .filter(Boolean);
    if (files.length > 0) return { files };

    const text = await this.powershell('Get-Clipboard -Raw');
    return text ? { text: text.replace(/\r?\n$/, '') } : null;
  }

  private async powershell(script: string): Promise<string> {
    const encoded = Buffer.from(`[Console]::OutputEncoding = [Text.Encoding]::UTF8; ${script}`, 'utf16le').toString('base64');
    const out = await this.run('powershell', ['-NoProfile', '-NonInteractive', '-EncodedCommand', encoded]);
    return out.toString('utf8');
  }

  // ─── Process plumbing ───

  private run(file: string, args: string[]): Promise<Buffer> {
    return new Promise((resolve, reject) => {
      execFile(
        file,
        args,
        { encoding: 'buffer', timeout: this.options.timeoutMs, maxBuffer: MAX_BUFFER, windowsHide: true },
        (error, stdout) => {
          if (error) {
            reject(new ReadFailureError(`${file} failed: ${error.message}`, error));
            return;
          }
          resolve(stdout);
        },
      );
    });
  }
}
