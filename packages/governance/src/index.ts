/**
 * @ledgerkit/governance
 *
 * Burn approval workflow with event-sourced membership.
 */

export { BurnGovernance } from "./governance.js";

export type {
  MemberRole,
  ProposalKind,
  BurnProposal,
  GovernanceMembers,
  GovernanceRequirements,
  GovernancePolicy,
  BurnGovernanceOptions,
  ApprovalOptions,
  ApprovalResult,
  GovernanceChangeEvent,
  MemberAddedEvent,
  MemberRemovedEvent,
  RequirementChangedEvent,
  GovernanceErrorCode,
} from "./types.js";

export { GovernanceError } from "./types.js";
