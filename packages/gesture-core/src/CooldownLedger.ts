/**
 * Last-trigger timestamps keyed by (subject id, gesture type). A pair with no
 * recorded trigger is always allowed to fire.
 */
export class CooldownLedger<T extends string> {
  private readonly triggers = new Map<number, Map<T, number>>();

  canTrigger(subject: number, type: T, timestamp: number, cooldownMs: number): boolean {
    const last = this.lastTrigger(subject, type);
    if (last === undefined) return true;
    return timestamp >= last + cooldownMs;
  }

  remember(subject: number, type: T, timestamp: number): void {
    let bySubject = this.triggers.get(subject);
    if (!bySubject) {
      bySubject = new Map<T, number>();
      this.triggers.set(subject, bySubject);
    }
    bySubject.set(type, timestamp);
  }

  lastTrigger(subject: number, type: T): number | undefined {
    return this.triggers.get(subject)?.get(type);
  }

  remove(subject: number): void {
    this.triggers.delete(subject);
  }
}
