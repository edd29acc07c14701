/**
 * Map keyed by numbers that tracks its smallest and largest key
 */
export class OrderedMap<T> extends Map<number, T> {
  private _min?: number;
  private _max?: number;

  get min(): number | undefined {
    return this._min;
  }

  get max(): number | undefined {
    return this._max;
  }

  set(key: number, value: T): this {
    if (this._min === undefined || key < this._min) {
      this._min = key;
    }

    if (this._max === undefined || key > this._max) {
      this._max = key;
    }

    super.set(key, value);
    return this;
  }

  delete(key: number): boolean {
    const deleted = super.delete(key);
    if (deleted && (key === this._min || key === this._max)) {
      this._min = undefined;
      this._max = undefined;
      for (const k of this.keys()) {
        if (this._min === undefined || k < this._min) this._min = k;
        if (this._max === undefined || k > this._max) this._max = k;
      }
    }
    return deleted;
  }

  clear(): void {
    super.clear();
    this._min = undefined;
    this._max = undefined;
  }
}
