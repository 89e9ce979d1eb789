/**
 * Safely extract an error message from an unknown thrown value.
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

export interface DelayRange {
  minMs: number;
  maxMs: number;
}

export const NO_DELAY: DelayRange = { minMs: 0, maxMs: 0 };

export class Helpers {

  static delay(ms: number): Promise<void> {
    return new Promise(resolve => setTimeout(resolve, ms));
  }

  /**
   * Wait a random time within the range (inclusive), like a person moving between pages
   */
  static async randomDelay(range: DelayRange): Promise<void> {
    const span = Math.max(0, range.maxMs - range.minMs);
    const ms = range.minMs + Math.random() * span;
    if (ms <= 0) return;
    await this.delay(ms);
  }

  static isSuccessStatus(status: number): boolean {
    return status >= 200 && status < 300;
  }

  static isRedirectStatus(status: number): boolean {
    return status >= 300 && status < 400;
  }
}
