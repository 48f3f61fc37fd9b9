/** Receives a notification every time the timer flips between work and rest. */
export interface AlertSink {
  ring(): void;
}

export const silentAlerts: AlertSink = {
  ring: () => undefined
};
