export class ProgressIndicator {
  private spinner = ['⠋', '⠙', '⠹', '⠸', '⠼', '⠴', '⠦', '⠧', '⠇', '⠏'];
  private currentFrame = 0;
  private interval: NodeJS.Timeout | undefined;
  private message: string;

  constructor(message: string, private stream: NodeJS.WriteStream = process.stdout) {
    this.message = message;
  }

  start(): void {
    // Spinner frames only make sense on a terminal
    if (!this.stream.isTTY) {
      return;
    }
    this.stream.write('\x1B[?25l'); // Hide cursor
    this.interval = setInterval(() => {
      this.stream.write(`\r${this.spinner[this.currentFrame]} ${this.message}`);
      this.currentFrame = (this.currentFrame + 1) % this.spinner.length;
    }, 100);
  }

  stop(finalMessage?: string): void {
    this.clear();
    if (finalMessage) {
      console.log(`✅ ${finalMessage}`);
    }
  }

  fail(errorMessage?: string): void {
    this.clear();
    if (errorMessage) {
      console.log(`❌ ${errorMessage}`);
    }
  }

  private clear(): void {
    if (this.interval === undefined) {
      return;
    }
    clearInterval(this.interval);
    this.interval = undefined;
    this.stream.write('\r\x1B[K'); // Clear line
    this.stream.write('\x1B[?25h'); // Show cursor
  }
}

export function formatDuration(ms: number): string {
  const seconds = Math.floor(ms / 1000);
  const minutes = Math.floor(seconds / 60);
  const hours = Math.floor(minutes / 60);

  if (hours > 0) {
    return `${hours}h ${minutes % 60}m ${seconds % 60}s`;
  } else if (minutes > 0) {
    return `${minutes}m ${seconds % 60}s`;
  } else {
    return `${seconds}s`;
  }
}

export function formatFileSize(bytes: number): string {
  const units = ['B', 'KB', 'MB', 'GB', 'TB'];
  let size = bytes;
  let unitIndex = 0;

  while (size >= 1024 && unitIndex < units.length - 1) {
    size /= 1024;
    unitIndex++;
  }

  return `${size.toFixed(1)} ${units[unitIndex]}`;
}
