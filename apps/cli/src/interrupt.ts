/**
 * Modelsync CLI - Ctrl+C Handling
 * The first interrupt asks before cancelling; a second one while asking forces exit
 */

import { errorMessage } from '@modelsync/shared';

export interface InterruptOptions {
  /** Resolve true to cancel; without it the first interrupt cancels at once */
  confirm?: () => Promise<boolean>;
  onCancel: () => void;
  exit?: (code: number) => void;
}

export const FORCED_EXIT_CODE = 130;

export class InterruptHandler {
  private asking = false;
  private cancelled = false;
  private exit: (code: number) => void;
  private listener = () => {
    this.handle().catch((error: unknown) => {
      console.error(errorMessage(error));
      this.exit(1);
    });
  };

  constructor(private options: InterruptOptions) {
    this.exit = options.exit ?? (code => process.exit(code));
  }

  get isCancelled(): boolean {
    return this.cancelled;
  }

  attach(): this {
    process.on('SIGINT', this.listener);
    return this;
  }

  detach(): void {
    process.off('SIGINT', this.listener);
  }

  async handle(): Promise<void> {
    if (this.asking || this.cancelled) {
      this.exit(FORCED_EXIT_CODE);
      return;
    }

    if (!this.options.confirm) {
      this.cancel();
      return;
    }

    this.asking = true;
    let confirmed: boolean;
    try {
      confirmed = await this.options.confirm();
    } catch {
      // The prompt itself was interrupted
      this.exit(FORCED_EXIT_CODE);
      return;
    } finally {
      this.asking = false;
    }

    if (confirmed) this.cancel();
  }

  private cancel(): void {
    this.cancelled = true;
    this.options.onCancel();
  }
}
