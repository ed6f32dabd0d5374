type OutcomeCounter = Record<string, number>;

export class Counters {
  navigationsTotal = 0;
  navigationFailuresTotal = 0;
  historyMissTotal = 0;
  reflowTotal: OutcomeCounter = {};

  markReflow(outcome: string): void {
    this.reflowTotal[outcome] = (this.reflowTotal[outcome] ?? 0) + 1;
  }
}
