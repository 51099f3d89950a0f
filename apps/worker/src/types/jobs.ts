/**
 * Job payload types for BullMQ queues
 */

import { z } from 'zod';
import { SERVICE_STATUSES } from '@slack-alerts/shared';

const userSchema = z.object({
  id: z.string().min(1),
  email: z.string(),
  username: z.string(),
  firstName: z.string().nullish(),
  lastName: z.string().nullish(),
});

const checkSchema = z.object({
  id: z.string().min(1),
  name: z.string().min(1),
  category: z.enum(['http', 'metrics', 'jenkins', 'tcp', 'other']),
  url: z.string().url().nullish(),
  lastError: z.string().nullish(),
  statusLink: z.string().nullish(),
  jobNumber: z.number().int().nullish(),
  image: z
    .object({
      fileName: z.string().optional(),
      contentBase64: z.string().min(1),
    })
    .nullish(),
});

/**
 * Payload for alerts:dispatch queue, enqueued by the host when a service changes status
 */
export const alertDispatchPayloadSchema = z.object({
  /** Unique alert identifier */
  alertId: z.string().min(1),

  /** Alert plugins to run (e.g., ['Slack']) */
  alertTypes: z.array(z.string().min(1)).min(1),

  /** Service snapshot; checks holds the failing checks only */
  service: z.object({
    id: z.string().min(1),
    name: z.string().min(1),
    overallStatus: z.enum(SERVICE_STATUSES),
    oldOverallStatus: z.enum(SERVICE_STATUSES),
    checks: z.array(checkSchema).default([]),
  }),

  users: z.array(userSchema).default([]),
  dutyOfficers: z.array(userSchema).default([]),

  /** ISO 8601 timestamp when the status changed */
  triggeredAt: z.string(),
});

export type AlertDispatchPayload = z.input<typeof alertDispatchPayloadSchema>;

export type ParsedAlertDispatch = z.output<typeof alertDispatchPayloadSchema>;

/**
 * Queue names as constants
 */
export const QUEUE_NAMES = {
  ALERTS_DISPATCH: 'alerts-dispatch',
} as const;

export type QueueName = typeof QUEUE_NAMES[keyof typeof QUEUE_NAMES];
