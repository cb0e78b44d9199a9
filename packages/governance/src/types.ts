/**
 * Burn Governance Types
 *
 * Membership, approval requirements and burn proposals.
 * Membership changes are captured as events for deterministic replay.
 *
 * Design:
 * - All types are readonly
 * - Event-sourced membership: state is derived from replaying events
 * - Quorum model: N approvals from the burner set, N = requiredBurnApprovals
 */

import type { Address, Quantity } from "@ledgerkit/types";

// =============================================================================
// Core Types
// =============================================================================

/** A governance role. Burners approve burns; minters may mint. */
export type MemberRole = "burner" | "minter";

/** Proposal families. Only burn proposals are created today. */
export type ProposalKind = "burn" | "mint";

/**
 * A request to burn tokens from the requestor's balance.
 */
export interface BurnProposal {
  /** 43-character identifier, unique per requestor */
  readonly id: string;

  readonly requestor: Address;

  readonly quantity: Quantity;

  /** Approver addresses in the order they approved */
  readonly approvals: readonly Address[];

  /** True once approvals reached the burn requirement; never reverts */
  readonly approved: boolean;

  /** ISO 8601 timestamp of creation */
  readonly createdAt: string;

  /** ISO 8601 timestamp of the approval that reached quorum */
  readonly approvedAt?: string | undefined;
}

export interface GovernanceMembers {
  readonly burners: readonly Address[];
  readonly minters: readonly Address[];
}

export interface GovernanceRequirements {
  readonly requiredBurnApprovals: number;
  readonly requiredMintApprovals: number;
}

/**
 * The current governance policy.
 */
export interface GovernancePolicy {
  /** Deterministic policy ID (hash of version, members and requirements) */
  readonly id: string;

  /** Incremented on each membership or requirement change */
  readonly version: number;

  readonly members: GovernanceMembers;

  readonly requirements: GovernanceRequirements;

  /** ISO 8601 timestamp of last policy change */
  readonly updatedAt: string;
}

// =============================================================================
// Options and Results
// =============================================================================

export interface BurnGovernanceOptions {
  readonly burners?: readonly Address[] | undefined;
  readonly minters?: readonly Address[] | undefined;

  /** Default: 1 */
  readonly requiredBurnApprovals?: number | undefined;

  /** Default: 1. Stored and reported; no mint proposals use it yet. */
  readonly requiredMintApprovals?: number | undefined;

  /**
   * Count repeated approvals from the same address.
   * Default: false, a second approval fails with ALREADY_APPROVED.
   */
  readonly countDuplicateApprovals?: boolean | undefined;

  /** Proposal ID source. Default: 32 random bytes, base64url. */
  readonly generateId?: (() => string) | undefined;

  /** Timestamp source. Default: current time, ISO 8601. */
  readonly clock?: (() => string) | undefined;
}

export interface ApprovalOptions {
  /**
   * Runs with the approved proposal before a quorum-reaching approval
   * is recorded. Throwing aborts the approval.
   */
  readonly beforeQuorum?: ((proposal: BurnProposal) => void) | undefined;
}

export interface ApprovalResult {
  readonly proposal: BurnProposal;

  /** True only for the approval that moved the proposal to approved */
  readonly quorumReached: boolean;
}

// =============================================================================
// Governance Change Events (Event-Sourced)
// =============================================================================

/**
 * Discriminated union of all governance change events.
 * These events form the authoritative history of membership changes.
 */
export type GovernanceChangeEvent =
  | MemberAddedEvent
  | MemberRemovedEvent
  | RequirementChangedEvent;

export interface MemberAddedEvent {
  readonly type: "member_added";
  readonly role: MemberRole;
  readonly address: Address;
  readonly timestamp: string;
}

export interface MemberRemovedEvent {
  readonly type: "member_removed";
  readonly role: MemberRole;
  readonly address: Address;
  readonly timestamp: string;
}

export interface RequirementChangedEvent {
  readonly type: "requirement_changed";
  readonly kind: ProposalKind;
  readonly previous: number;
  readonly value: number;
  readonly timestamp: string;
}

// =============================================================================
// Errors
// =============================================================================

export type GovernanceErrorCode =
  | "UNAUTHORIZED"
  | "PROPOSAL_NOT_FOUND"
  | "PROPOSAL_CLOSED"
  | "ALREADY_APPROVED"
  | "QUORUM_UNREACHABLE"
  | "MEMBER_EXISTS"
  | "MEMBER_NOT_FOUND";

export class GovernanceError extends Error {
  public readonly code: GovernanceErrorCode;
  constructor(code: GovernanceErrorCode, message: string) {
    super(message);
    this.name = "GovernanceError";
    this.code = code;
  }
}
