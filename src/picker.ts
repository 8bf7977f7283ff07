import { emitKeypressEvents } from 'readline';
import type { Readable, Writable } from 'stream';

export type PickerInput = Readable & {
  isTTY?: boolean;
  setRawMode?: (mode: boolean) => unknown;
};

interface Keypress {
  name?: string;
  ctrl?: boolean;
}

/**
 * Arrow-key (or j/k) list picker. Resolves to the chosen index, or null on
 * q, Esc or Ctrl-C.
 */
export function pick(
  items: string[],
  input: PickerInput,
  output: Writable,
  visible: number = 5
): Promise<number | null> {
  if (items.length === 0) {
    return Promise.resolve(null);
  }

  const rows = Math.min(visible, items.length);
  let cursor = 0;
  let top = 0;
  let drawn = false;

  const render = () => {
    if (cursor < top) {
      top = cursor;
    } else if (cursor >= top + rows) {
      top = cursor - rows + 1;
    }
    if (drawn) {
      output.write(`\x1b[${rows}A`);
    }
    for (let i = top; i < top + rows; i++) {
      const marker = i === cursor ? '>' : ' ';
      output.write(`\r\x1b[K ${marker} ${items[i]}\n`);
    }
    drawn = true;
  };

  return new Promise((resolve) => {
    emitKeypressEvents(input);
    const raw = Boolean(input.isTTY && input.setRawMode);
    if (raw) {
      input.setRawMode?.(true);
    }

    const finish = (result: number | null) => {
      input.off('keypress', onKeypress);
      if (raw) {
        input.setRawMode?.(false);
      }
      input.pause();
      resolve(result);
    };

    const onKeypress = (_text: string | undefined, key: Keypress | undefined) => {
      const name = key?.name;
      if (name === 'c' && key?.ctrl) {
        finish(null);
      } else if ((name === 'up' || name === 'k') && cursor > 0) {
        cursor--;
        render();
      } else if ((name === 'down' || name === 'j') && cursor < items.length - 1) {
        cursor++;
        render();
      } else if (name === 'return' || name === 'enter') {
        finish(cursor);
      } else if (name === 'q' || name === 'escape') {
        finish(null);
      }
    };

    input.on('keypress', onKeypress);
    input.resume();
    render();
  });
}
