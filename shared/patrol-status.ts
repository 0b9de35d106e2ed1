/**
 * Patrol progress for a single location.
 *
 * Used by the field client (local cache) and by the backend status endpoint.
 */

export type PatrolState = 'NotStarted' | 'InProgress' | 'Completed';

export interface PatrolStatus {
  locationId: number | string;
  totalCheckpoints: number;
  verifiedCheckpoints: number;
  state: PatrolState;
  isComplete: boolean;
  lastVerificationTime: string | null;
}

export function derivePatrolState(totalCheckpoints: number, verifiedCheckpoints: number): PatrolState {
  if (verifiedCheckpoints <= 0) return 'NotStarted';
  if (totalCheckpoints > 0 && verifiedCheckpoints >= totalCheckpoints) return 'Completed';
  return 'InProgress';
}

export function derivePatrolStatus(
  locationId: number | string,
  totalCheckpoints: number,
  verificationTimes: string[]
): PatrolStatus {
  const verifiedCheckpoints = verificationTimes.length;
  const state = derivePatrolState(totalCheckpoints, verifiedCheckpoints);
  const lastVerificationTime = verificationTimes.length > 0
    ? verificationTimes.reduce((latest, t) => (t > latest ? t : latest))
    : null;

  return {
    locationId,
    totalCheckpoints,
    verifiedCheckpoints,
    state,
    isComplete: state === 'Completed',
    lastVerificationTime,
  };
}

export function getPatrolStateLabel(state: PatrolState): string {
  switch (state) {
    case 'NotStarted': return 'Not started';
    case 'InProgress': return 'In progress';
    case 'Completed': return 'Completed';
  }
}
