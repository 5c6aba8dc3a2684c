export interface SizeLadder {
  family: string;
  /** Ordered smallest to largest. */
  sizes: string[];
}

interface LadderPosition {
  ladder: SizeLadder;
  index: number;
}

export class SizeAdvisor {
  private readonly positions = new Map<string, LadderPosition>();

  constructor(
    ladders: readonly SizeLadder[],
    private readonly underutilizationThreshold: number,
  ) {
    for (const ladder of ladders) {
      ladder.sizes.forEach((size, index) => {
        if (!this.positions.has(size)) {
          this.positions.set(size, { ladder, index });
        }
      });
    }
  }

  familyOf(size: string): string | undefined {
    return this.positions.get(size)?.ladder.family;
  }

  /**
   * Next-smaller rung of the size's ladder when utilization is below the
   * underutilization threshold. Unknown sizes and the smallest rung yield undefined.
   */
  recommendSize(currentSize: string, avgCpuUtilization: number): string | undefined {
    if (!(avgCpuUtilization < this.underutilizationThreshold)) return undefined;
    const position = this.positions.get(currentSize);
    if (!position || position.index === 0) return undefined;
    const candidate = position.ladder.sizes[position.index - 1];
    return candidate !== undefined && candidate !== currentSize ? candidate : undefined;
  }
}
