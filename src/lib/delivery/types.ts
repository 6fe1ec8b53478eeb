export interface DeliveryChannel {
  readonly name: string;
  /** Per-run preference that must also be enabled */
  readonly preferenceKey: string;
  /** Global switch from settings */
  readonly enabled: boolean;
  send(subject: string, content: string): Promise<void>;
}
