import { spawn } from 'child_process';
import { mkdtemp, readFile, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import path from 'path';
import { EditorError, errorCode } from './errors.js';

/** Opens an editing session seeded with `initialText`; null means the user left it empty. */
export type EditorSession = (initialText: string) => Promise<string | null>;

export interface EditorSessionOptions {
  /** Shell command line; the temp file path is appended. */
  command: string;
  /** Directory that receives the per-session temp directory. */
  tmpRoot?: string;
}

// GUI editors return immediately unless told to wait for the window to close
const GUI_EDITORS_WAIT_FLAG: Record<string, string> = {
  subl: '-w',
  code: '--wait',
  mate: '-w',
  atom: '--wait',
  zed: '--wait'
};

export function resolveEditorCommand(
  configured: string | undefined,
  env: Record<string, string | undefined> = process.env
): string {
  const command = (configured || env.EDITOR || env.VISUAL || 'nano').trim();
  const parts = command.split(/\s+/);
  const program = path.parse(parts[0] ?? '').name;
  const waitFlag = GUI_EDITORS_WAIT_FLAG[program];
  if (waitFlag && !parts.includes(waitFlag)) {
    return `${command} ${waitFlag}`;
  }
  return command;
}

function shellQuote(value: string): string {
  return `'${value.replace(/'/g, `'\\''`)}'`;
}

function runEditor(command: string, file: string): Promise<void> {
  return new Promise((resolve, reject) => {
    const child = spawn(`${command} ${shellQuote(file)}`, {
      shell: true,
      stdio: 'inherit'
    });

    child.on('error', (err) => {
      reject(new EditorError(`Failed to launch editor "${command}": ${err.message}`));
    });

    child.on('close', (code, signal) => {
      if (signal) {
        reject(new EditorError(`Editor "${command}" was terminated by ${signal}`));
      } else if (code === 127) {
        reject(new EditorError(`Editor "${command}" not found`));
      } else if (code !== 0) {
        reject(new EditorError(`Editor "${command}" exited with code ${code}`));
      } else {
        resolve();
      }
    });
  });
}

/**
 * Runs one editing session in a private temp directory, which is removed on
 * every exit path. Blocks for as long as the editor stays open.
 */
export async function openEditorSession(
  initialText: string,
  options: EditorSessionOptions
): Promise<string | null> {
  const dir = await mkdtemp(path.join(options.tmpRoot ?? tmpdir(), 'hl-'));
  const file = path.join(dir, 'highlight.md');

  try {
    await writeFile(file, initialText, 'utf8');
    await runEditor(options.command, file);

    let content: string;
    try {
      content = await readFile(file, 'utf8');
    } catch (error) {
      if (errorCode(error) === 'ENOENT') {
        throw new EditorError(`Editor "${options.command}" removed the highlight file`);
      }
      throw error;
    }

    const text = content.trim();
    return text.length > 0 ? text : null;
  } finally {
    await rm(dir, { recursive: true, force: true });
  }
}

export function createEditorSession(options: EditorSessionOptions): EditorSession {
  return (initialText) => openEditorSession(initialText, options);
}
