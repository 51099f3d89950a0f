import type { DispatchErrorCode, ServiceAlert } from '@slack-alerts/shared';

export interface PluginResult {
  success: boolean;
  /** Policy decided the transition is not announced */
  skipped?: boolean;
  error?: string;
  errorCode?: DispatchErrorCode;
  messageTs?: string;
}

/**
 * Delivers a service alert through one alert type (e.g. "Slack")
 */
export interface AlertPlugin {
  readonly name: string;
  sendAlert(alert: ServiceAlert): Promise<PluginResult>;
}
