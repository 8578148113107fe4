interface Settler<T> {
  resolve(value: T): void;
  reject(error: unknown): void;
}

export class Completion<T> {
  readonly promise: Promise<T>;
  private settler: Settler<T> | undefined;

  constructor() {
    let settler: Settler<T> | undefined;
    this.promise = new Promise<T>((resolve, reject) => {
      settler = { resolve, reject };
    });
    this.settler = settler;
  }

  get settled(): boolean {
    return this.settler === undefined;
  }

  resolve(value: T): void {
    this.take().resolve(value);
  }

  reject(error: unknown): void {
    this.take().reject(error);
  }

  private take(): Settler<T> {
    const settler = this.settler;
    if (!settler) {
      throw new Error('Completion already settled');
    }
    this.settler = undefined;
    return settler;
  }
}
