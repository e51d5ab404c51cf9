/**
 * Per-instrument cooldown between alerts.
 *
 * `shouldNotify` only decides; the caller records with `recordNotification`
 * once it has actually sent.
 */
export class NotificationGate {
    private lastNotified = new Map<string, number>();

    constructor(
        private readonly cooldownMs: number,
        private readonly now: () => number = Date.now
    ) {}

    public shouldNotify(instrumentId: string): boolean {
        const last = this.lastNotified.get(instrumentId);
        if (last === undefined) {
            return true;
        }
        return this.now() - last > this.cooldownMs;
    }

    public recordNotification(instrumentId: string): void {
        this.lastNotified.set(instrumentId, this.now());
    }
}
