/** Logged, never thrown: state-change visibility is best-effort. */
export class BroadcastDeliveryWarning extends Error {
  constructor(
    public readonly topic: string,
    public readonly reason: string,
  ) {
    super(`Broadcast to ${topic} dropped: ${reason}`);
    this.name = 'BroadcastDeliveryWarning';
  }
}
