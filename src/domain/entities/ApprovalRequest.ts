import type { TierTransition } from '../tiers.js';
import type { DecisionVerdict } from './Device.js';

export type ApprovalStatus = 'pending' | 'approved' | 'rejected';

/**
 * ApprovalRequest entity - asks a human to let a device move one tier forward
 */
export interface ApprovalRequest {
  id: string;
  deviceId: string;
  transition: TierTransition;
  /** countSinceThreshold when the threshold was crossed */
  fileCount: number;
  createdAt: Date;
  status: ApprovalStatus;
  decidedBy: string | null;
  decidedAt: Date | null;
  comment: string | null;
  /** Set once the notification dispatcher accepted the request */
  notifiedAt: Date | null;
}

/**
 * DecisionHistoryEntry - immutable audit record of a resolved request
 */
export interface DecisionHistoryEntry {
  id: number;
  requestId: string;
  deviceId: string;
  transition: TierTransition;
  fileCount: number;
  verdict: DecisionVerdict;
  decidedBy: string;
  decidedAt: Date;
  requestedAt: Date;
  comment: string | null;
}

export function createApprovalRequest(params: {
  id: string;
  deviceId: string;
  transition: TierTransition;
  fileCount: number;
  createdAt?: Date;
}): ApprovalRequest {
  return {
    id: params.id,
    deviceId: params.deviceId,
    transition: params.transition,
    fileCount: params.fileCount,
    createdAt: params.createdAt ?? new Date(),
    status: 'pending',
    decidedBy: null,
    decidedAt: null,
    comment: null,
    notifiedAt: null,
  };
}

export function verdictToStatus(verdict: DecisionVerdict): Exclude<ApprovalStatus, 'pending'> {
  return verdict === 'approve' ? 'approved' : 'rejected';
}
