import type { Proposal } from './tenderTypes.js';

/**
 * Leader after `candidate` gained a vote. Only a strictly greater count
 * displaces the incumbent; on a tie the proposal that reached the count
 * first stays in front.
 */
export const nextLeader = (
  proposals: readonly Proposal[],
  incumbentIndex: number,
  candidate: Proposal,
): number => {
  const incumbent = proposals[incumbentIndex];
  if (!incumbent) return candidate.id;
  return candidate.voteCount > incumbent.voteCount ? candidate.id : incumbentIndex;
};
