/**
 * Line spinner for plain terminal output. Draws nothing when stdout is not a TTY.
 */

const FRAMES = ['⠋', '⠙', '⠹', '⠸', '⠼', '⠴', '⠦', '⠧', '⠇', '⠏'];

export class Spinner {
  private intervalId: NodeJS.Timeout | null = null;
  private currentFrame = 0;

  constructor(private text: string = 'Working...') {}

  start(): void {
    if (this.intervalId || process.stdout.isTTY !== true) {
      return;
    }
    this.currentFrame = 0;
    process.stdout.write('\x1B[?25l');
    this.intervalId = setInterval(() => {
      const frame = FRAMES[this.currentFrame % FRAMES.length];
      process.stdout.write(`\r${frame} ${this.text}`);
      this.currentFrame++;
    }, 80);
  }

  update(text: string): void {
    this.text = text;
  }

  stop(): void {
    if (!this.intervalId) {
      return;
    }
    clearInterval(this.intervalId);
    this.intervalId = null;
    process.stdout.write('\r' + ' '.repeat(process.stdout.columns || 80) + '\r');
    process.stdout.write('\x1B[?25h');
  }
}
