import { dim } from './colors';

export type Spinner = {
  start: (text?: string) => void;
  /** Change the label without restarting the animation. */
  update: (text: string) => void;
  stop: () => void;
};

export function createSpinner(
  enabled: boolean,
  intervalMs = 80,
  out: NodeJS.WritableStream = process.stdout,
): Spinner {
  const frames = ['⠋', '⠙', '⠹', '⠸', '⠼', '⠴', '⠦', '⠧', '⠇', '⠏'];
  let frameIdx = 0;
  let timer: NodeJS.Timeout | null = null;
  let lastText = 'looking up';

  const start = (text?: string) => {
    if (text) lastText = text;
    if (!enabled || timer) return;
    timer = setInterval(() => {
      const txt = dim(`  ${frames[frameIdx]} ${lastText}`);
      frameIdx = (frameIdx + 1) % frames.length;
      out.write(`\r\x1b[2K${txt}`);
    }, intervalMs);
  };

  const update = (text: string) => {
    lastText = text;
  };

  const stop = () => {
    if (timer) clearInterval(timer);
    timer = null;
    if (enabled) out.write('\r\x1b[2K');
  };

  return { start, update, stop };
}
