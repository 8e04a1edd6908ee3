import type { ApprovalRequest, DecisionHistoryEntry } from '../domain/entities/ApprovalRequest.js';
import type { DeviceRecord } from '../domain/entities/Device.js';
import { formatTransition } from '../domain/tiers.js';

export function mapRequestToResponse(request: ApprovalRequest) {
  return {
    id: request.id,
    deviceId: request.deviceId,
    fromTier: request.transition.from,
    toTier: request.transition.to,
    transition: formatTransition(request.transition),
    fileCount: request.fileCount,
    status: request.status,
    createdAt: request.createdAt.toISOString(),
    decidedBy: request.decidedBy,
    decidedAt: request.decidedAt ? request.decidedAt.toISOString() : null,
    comment: request.comment,
    notifiedAt: request.notifiedAt ? request.notifiedAt.toISOString() : null,
  };
}

export function mapHistoryToResponse(entry: DecisionHistoryEntry) {
  return {
    id: entry.id,
    requestId: entry.requestId,
    deviceId: entry.deviceId,
    fromTier: entry.transition.from,
    toTier: entry.transition.to,
    fileCount: entry.fileCount,
    verdict: entry.verdict,
    decidedBy: entry.decidedBy,
    decidedAt: entry.decidedAt.toISOString(),
    requestedAt: entry.requestedAt.toISOString(),
    comment: entry.comment,
  };
}

export function mapDeviceToResponse(device: DeviceRecord) {
  return {
    id: device.id,
    currentTier: device.currentTier,
    countSinceThreshold: device.countSinceThreshold,
    paused: device.paused,
    version: device.version,
  };
}
