import {
  onAccess,
  resetReplacementState,
  selectVictim,
  type ReplacementLine,
  type ReplacementState,
} from "./ReplacementPolicy";

export interface CacheLine extends ReplacementLine {
  tag: number;
  valid: boolean;
  dirty: boolean;
  stamp: number;
  data: Uint8Array;
}

export interface LineView {
  readonly way: number;
  readonly tag: number;
  readonly valid: boolean;
  readonly dirty: boolean;
  readonly data: Uint8Array;
}

/**
 * The ways that share one set index. Lookup is a linear scan; associativity is a small constant.
 */
export class CacheSet {
  private readonly lines: CacheLine[];

  constructor(
    readonly index: number,
    private readonly lineSize: number,
    associativity: number,
    private readonly replacement: ReplacementState,
  ) {
    this.lines = Array.from({ length: associativity }, () => this.createLine());
  }

  get associativity(): number {
    return this.lines.length;
  }

  lookup(tag: number): number | undefined {
    const way = this.lines.findIndex((line) => line.valid && line.tag === tag);
    return way === -1 ? undefined : way;
  }

  line(way: number): CacheLine {
    const line = this.lines[way];
    if (!line) {
      throw new RangeError(`Way ${way} is outside set ${this.index} (associativity ${this.lines.length})`);
    }
    return line;
  }

  touch(way: number): void {
    this.line(way);
    onAccess(this.replacement, this.lines, way, "hit");
  }

  fill(tag: number, way: number, data: Uint8Array): void {
    const line = this.line(way);
    if (data.length !== this.lineSize) {
      throw new RangeError(`Fill data must be ${this.lineSize} bytes, received ${data.length}`);
    }

    const existing = this.lookup(tag);
    if (existing !== undefined && existing !== way) {
      throw new RangeError(`Tag 0x${tag.toString(16)} is already resident in way ${existing} of set ${this.index}`);
    }

    line.tag = tag;
    line.valid = true;
    line.dirty = false;
    line.data.set(data);
    onAccess(this.replacement, this.lines, way, "fill");
  }

  evictionCandidate(): number {
    return selectVictim(this.replacement, this.lines);
  }

  invalidate(way: number): void {
    const line = this.line(way);
    line.valid = false;
    line.dirty = false;
    line.stamp = 0;
  }

  invalidateAll(): void {
    for (let way = 0; way < this.lines.length; way++) {
      this.invalidate(way);
    }
  }

  reset(): void {
    this.invalidateAll();
    resetReplacementState(this.replacement);
  }

  /** Valid lines with their dirty state, in way order. */
  residentLines(): Array<{ way: number; line: CacheLine }> {
    return this.lines.flatMap((line, way) => (line.valid ? [{ way, line }] : []));
  }

  views(): LineView[] {
    return this.lines.map((line, way) => ({
      way,
      tag: line.tag,
      valid: line.valid,
      dirty: line.dirty,
      data: line.data.slice(),
    }));
  }

  private createLine(): CacheLine {
    return { tag: 0, valid: false, dirty: false, stamp: 0, data: new Uint8Array(this.lineSize) };
  }
}
