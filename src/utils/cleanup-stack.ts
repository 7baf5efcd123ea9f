export interface CleanupError {
  label: string;
  error: unknown;
}

interface CleanupEntry {
  label: string;
  release: () => Promise<void>;
}

/**
 * LIFO stack of release actions. `unwind` runs every action even when
 * earlier ones fail, and only ever runs once per registration.
 */
export class CleanupStack {
  private entries: CleanupEntry[] = [];

  defer(label: string, release: () => Promise<void>): void {
    this.entries.push({ label, release });
  }

  get size(): number {
    return this.entries.length;
  }

  // Keep the acquired resources alive past this scope.
  dismiss(): string[] {
    const labels = this.entries.map((entry) => entry.label);
    this.entries = [];
    return labels;
  }

  async unwind(): Promise<CleanupError[]> {
    const errors: CleanupError[] = [];
    while (this.entries.length > 0) {
      const entry = this.entries.pop();
      if (!entry) {
        break;
      }
      try {
        await entry.release();
      } catch (error) {
        errors.push({ label: entry.label, error });
      }
    }
    return errors;
  }
}
