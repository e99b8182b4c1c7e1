export type AlertSeverity = 'info' | 'warn' | 'critical';
export const SEVERITY_RANK: Record<AlertSeverity, number> = { info: 0, warn: 1, critical: 2 };

/** Where a message belongs: trade ideas, lifecycle chatter, or degraded-data notices. */
export type ChannelTag = 'signals' | 'status' | 'warnings';

export interface AlertField {
  name: string;
  value: string;
  inline?: boolean;
}

export interface AlertMessage {
  title: string;
  body: string;
  severity: AlertSeverity;
  fields?: AlertField[];
  /** Accent for rich channels (Discord embed colour). */
  color?: number;
  timestamp: number;
}
