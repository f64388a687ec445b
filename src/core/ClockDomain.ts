/**
 * ClockDomain - a free-running clock with its own period
 *
 * Keeps the time of its next rising edge; the simulator fires whichever
 * domain's edge comes first.
 */
export class ClockDomain {
  public readonly name: string;
  public readonly periodNs: number;
  private nextEdge: number;
  private ticks = 0;

  /**
   * @param phaseNs - Time of the first edge (default: one period in)
   * @throws {Error} If the period is not a positive finite number
   */
  constructor(name: string, periodNs: number, phaseNs: number = periodNs) {
    if (!Number.isFinite(periodNs) || periodNs <= 0) {
      throw new Error(`Invalid clock period for ${name}: ${periodNs}`);
    }
    this.name = name;
    this.periodNs = periodNs;
    this.nextEdge = phaseNs;
  }

  public getNextEdge(): number {
    return this.nextEdge;
  }

  /**
   * Consumes the pending edge and schedules the next one
   */
  public tick(): number {
    const edge = this.nextEdge;
    this.ticks++;
    this.nextEdge = edge + this.periodNs;
    return edge;
  }

  public getTickCount(): number {
    return this.ticks;
  }
}
