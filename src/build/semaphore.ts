/**
 * 同時実行数を制限するセマフォ（プロセス内）
 */

export class Semaphore {
  private permits: number;
  private readonly waiting: Array<() => void> = [];
  private inFlight = 0;
  private peakInFlight = 0;

  constructor(private readonly maxPermits: number) {
    if (maxPermits <= 0) {
      throw new Error("Semaphore maxPermits must be > 0");
    }
    this.permits = maxPermits;
  }

  async acquire(): Promise<void> {
    if (this.permits > 0) {
      this.permits--;
      this.markAcquired();
      return;
    }
    await new Promise<void>((resolve) => {
      this.waiting.push(resolve);
    });
  }

  release(): void {
    this.inFlight--;

    const next = this.waiting.shift();
    if (next) {
      // 許可をそのまま待機者に渡す
      this.markAcquired();
      next();
    } else {
      this.permits++;
    }
  }

  /**
   * 許可を取得して操作を実行し、必ず解放する
   */
  async run<T>(operation: () => Promise<T>): Promise<T> {
    await this.acquire();
    try {
      return await operation();
    } finally {
      this.release();
    }
  }

  getInFlight(): number {
    return this.inFlight;
  }

  getPeak(): number {
    return this.peakInFlight;
  }

  getAvailable(): number {
    return this.permits;
  }

  getWaiting(): number {
    return this.waiting.length;
  }

  get capacity(): number {
    return this.maxPermits;
  }

  private markAcquired(): void {
    this.inFlight++;
    if (this.inFlight > this.peakInFlight) {
      this.peakInFlight = this.inFlight;
    }
  }
}
