/**
 * The per-frame region list kept by the detector side. The registry mirrors it
 * row-for-row, so index i in one always names the same object as index i in the other.
 */
export interface RegionStore<G> {
  add(region: G): void;
  removeAt(index: number): void;
  get(index: number): G | undefined;
  count(): number;
  clear(): void;
}

export class InMemoryRegionStore<G> implements RegionStore<G> {
  private regions: G[] = [];

  add(region: G): void {
    this.regions.push(region);
  }

  removeAt(index: number): void {
    if (index < 0 || index >= this.regions.length) {
      throw new RangeError(`No region at index ${index}`);
    }
    this.regions.splice(index, 1);
  }

  get(index: number): G | undefined {
    return this.regions[index];
  }

  count(): number {
    return this.regions.length;
  }

  clear(): void {
    this.regions = [];
  }
}
