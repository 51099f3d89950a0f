// Domain types for Slack alert dispatch

export type UUID = string;

export const SERVICE_STATUSES = ["PASSING", "WARNING", "ERROR", "CRITICAL", "ACKED"] as const;
export type ServiceStatus = (typeof SERVICE_STATUSES)[number];

export const DISPATCH_ERROR_CODES = [
  "USER_RESOLUTION_FAILURE",
  "CHANNEL_JOIN_FAILURE",
  "INVITE_FAILURE",
  "UPLOAD_FAILURE",
  "POST_FAILURE",
  "CONFIGURATION_ERROR",
] as const;
export type DispatchErrorCode = (typeof DISPATCH_ERROR_CODES)[number];

/** Literal override value that drops a user from mentions entirely */
export const IGNORE_SLACK_USER_ID = "ignore";

// Configuration records (managed by the host's admin surface)

export interface SlackInstance {
  id: UUID;
  name: string;
  serverUrl: string;
  accessToken: string;
  defaultChannel?: string | null;
}

export interface ChannelBinding {
  serviceId: UUID;
  slackInstanceId: UUID;
  /** Channel ID (C…/G…) or channel name, with or without leading '#' */
  channel?: string | null;
}

export interface SlackUserOverride {
  userId: UUID;
  slackUserId: string;
}

// Alert event (ephemeral, built per alert)

export interface CheckSummary {
  name: string;
  url: string;
  error?: string | null;
  statusLink?: string | null;
  statusLinkLabel?: string;
}

export interface ImageAttachment {
  fileName: string;
  data: Buffer;
  title?: string;
}

export interface AlertRecipient {
  /** Email address or Slack handle */
  identifier: string;
  /** Explicit Slack user ID; IGNORE_SLACK_USER_ID removes the recipient */
  slackUserId?: string | null;
  firstName?: string | null;
  lastName?: string | null;
  profileUrl?: string | null;
}

export interface AlertEvent {
  serviceName: string;
  status: ServiceStatus;
  previousStatus?: ServiceStatus | null;
  messageBody?: string | null;
  checks: CheckSummary[];
  images: ImageAttachment[];
  recipients: AlertRecipient[];
  /** When false, users are still invited but not @mentioned */
  mentionRecipients: boolean;
}

// Host-side snapshot types carried on the alert queue

export type CheckCategory = "http" | "metrics" | "jenkins" | "tcp" | "other";

export interface ServiceCheckSnapshot {
  id: UUID;
  name: string;
  category: CheckCategory;
  /** Link to the check in the host UI; built from PUBLIC_BASE_URL when absent */
  url?: string | null;
  lastError?: string | null;
  statusLink?: string | null;
  jobNumber?: number | null;
  image?: {
    fileName?: string;
    contentBase64: string;
  } | null;
}

export interface ServiceSnapshot {
  id: UUID;
  name: string;
  overallStatus: ServiceStatus;
  oldOverallStatus: ServiceStatus;
  checks: ServiceCheckSnapshot[];
}

export interface AlertUser {
  id: UUID;
  email: string;
  username: string;
  firstName?: string | null;
  lastName?: string | null;
}

export interface ServiceAlert {
  alertId: UUID;
  service: ServiceSnapshot;
  users: AlertUser[];
  dutyOfficers: AlertUser[];
  triggeredAt: string;
}

export interface AlertHistoryEntry {
  alertId: UUID;
  serviceId: UUID;
  plugin: string;
  success: boolean;
  skipped?: boolean;
  error?: string;
  errorCode?: DispatchErrorCode;
  messageTs?: string;
  recordedAt: string;
}
