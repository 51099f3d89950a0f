import type { ServiceStatus } from '@slack-alerts/shared';

export interface AlertPolicy {
  /** Whether a message is posted at all */
  send: boolean;
  /** Whether recipients are @mentioned */
  mentionRecipients: boolean;
}

const SKIP: AlertPolicy = { send: false, mentionRecipients: false };
const QUIET: AlertPolicy = { send: true, mentionRecipients: false };
const LOUD: AlertPolicy = { send: true, mentionRecipients: true };

/**
 * Decide how a status transition is announced
 */
export function alertPolicy(current: ServiceStatus, previous?: ServiceStatus | null): AlertPolicy {
  switch (current) {
    case 'WARNING':
      return QUIET;
    case 'ERROR':
      // repeated ERROR does not ping again
      return previous === 'ERROR' ? QUIET : LOUD;
    case 'CRITICAL':
      return LOUD;
    case 'PASSING':
      // recovery after an acked failure was already announced by the ack
      if (previous === 'ACKED') return SKIP;
      if (previous === 'WARNING') return QUIET;
      return LOUD;
    case 'ACKED':
      if (previous === 'ACKED' || previous === 'PASSING') return SKIP;
      return QUIET;
    default:
      return LOUD;
  }
}
