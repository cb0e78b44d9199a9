/**
 * Burn Governance
 *
 * Multi-approval workflow for burns plus the membership that drives it.
 *
 * A burn proposal moves PENDING → APPROVED once it collects
 * `requiredBurnApprovals` approvals from burners. The approval that
 * causes the transition is reported with `quorumReached: true`; every
 * later approval attempt fails, so the caller executes the burn once.
 *
 * Membership and requirements are event-sourced: every change emits a
 * GovernanceChangeEvent, and `replayFrom()` rebuilds the same state.
 * Proposals are not part of the event history.
 */

import { createHash, randomBytes } from "node:crypto";
import { canonicalize } from "json-canonicalize";
import type { Address, Quantity } from "@ledgerkit/types";
import { Type, Validator, addressType, quantityType } from "@ledgerkit/validation";
import type {
  ApprovalOptions,
  ApprovalResult,
  BurnGovernanceOptions,
  BurnProposal,
  GovernanceChangeEvent,
  GovernanceMembers,
  GovernancePolicy,
  GovernanceRequirements,
  MemberRole,
  ProposalKind,
} from "./types.js";
import { GovernanceError } from "./types.js";

const burnRequestInput = new Validator({
  requestor: addressType("Cannot add burn request.", "Requestor address"),
  quantity: quantityType("Cannot add burn request.", "Quantity"),
});

const memberInput = addressType("Cannot update governance members.", "Member address");

const requirementInput = Type.number("Approval requirement must be a number.")
  .integer("Approval requirement must be an integer.")
  .greaterThan(0, "Approval requirement must be greater than 0.");

function defaultId(): string {
  return randomBytes(32).toString("base64url");
}

function defaultClock(): string {
  return new Date().toISOString();
}

// =============================================================================
// Burn Governance
// =============================================================================

export class BurnGovernance {
  private readonly burners: Set<Address> = new Set();
  private readonly minters: Set<Address> = new Set();
  private requiredBurnApprovals = 1;
  private requiredMintApprovals = 1;
  private version = 0;
  private lastUpdated: string;
  private readonly events: GovernanceChangeEvent[] = [];

  /** kind → requestor → id → proposal */
  private readonly proposals: Map<ProposalKind, Map<Address, Map<string, BurnProposal>>> = new Map([
    ["burn", new Map()],
    ["mint", new Map()],
  ]);

  private readonly countDuplicateApprovals: boolean;
  private readonly generateId: () => string;
  private readonly clock: () => string;

  /**
   * Initial members and requirements are recorded as events, so the
   * configured state is part of the replayable history.
   */
  constructor(options: BurnGovernanceOptions = {}) {
    this.countDuplicateApprovals = options.countDuplicateApprovals ?? false;
    this.generateId = options.generateId ?? defaultId;
    this.clock = options.clock ?? defaultClock;
    this.lastUpdated = this.clock();

    for (const address of options.burners ?? []) {
      if (!this.burners.has(address)) this.addMember("burner", address);
    }
    for (const address of options.minters ?? []) {
      if (!this.minters.has(address)) this.addMember("minter", address);
    }
    if (options.requiredBurnApprovals !== undefined && options.requiredBurnApprovals !== 1) {
      this.changeRequirement("burn", options.requiredBurnApprovals);
    }
    if (options.requiredMintApprovals !== undefined && options.requiredMintApprovals !== 1) {
      this.changeRequirement("mint", options.requiredMintApprovals);
    }
  }

  // ─── Authorization ───────────────────────────────────────────────────

  isBurner(address: Address): boolean {
    return this.burners.has(address);
  }

  isMinter(address: Address): boolean {
    return this.minters.has(address);
  }

  /** @throws GovernanceError UNAUTHORIZED unless `address` is a burner */
  canBurn(address: Address): void {
    if (!this.isBurner(address)) {
      throw new GovernanceError("UNAUTHORIZED", `Address '${address}' unauthorized to burn tokens`);
    }
  }

  /** @throws GovernanceError UNAUTHORIZED unless `address` is a minter */
  canMint(address: Address): void {
    if (!this.isMinter(address)) {
      throw new GovernanceError("UNAUTHORIZED", `Address '${address}' unauthorized to mint tokens`);
    }
  }

  // ─── Proposals ───────────────────────────────────────────────────────

  /**
   * Store a new PENDING burn proposal for `requestor`.
   * The ID is regenerated until it is unique among the requestor's proposals.
   */
  createBurnRequest(requestor: Address, quantity: Quantity): BurnProposal {
    burnRequestInput.validateTypes({ requestor, quantity }, ["requestor", "quantity"]);

    const scope = this.scope("burn", requestor);
    let id = this.generateId();
    while (scope.has(id)) {
      id = this.generateId();
    }

    const proposal: BurnProposal = {
      id,
      requestor,
      quantity,
      approvals: [],
      approved: false,
      createdAt: this.clock(),
    };

    scope.set(id, proposal);
    return proposal;
  }

  /**
   * @throws GovernanceError PROPOSAL_NOT_FOUND
   */
  getProposal(kind: ProposalKind, requestor: Address, id: string): BurnProposal {
    const proposal = this.proposals.get(kind)?.get(requestor)?.get(id);
    if (proposal === undefined) {
      throw new GovernanceError(
        "PROPOSAL_NOT_FOUND",
        `Burn request with ID '${id}' does not exist for address '${requestor}'`,
      );
    }
    return proposal;
  }

  /**
   * Approve a burn proposal on behalf of `approver`.
   *
   * Order of checks:
   * 1. `approver` is a burner (UNAUTHORIZED)
   * 2. The proposal exists (PROPOSAL_NOT_FOUND)
   * 3. It is still pending (PROPOSAL_CLOSED)
   * 4. `approver` has not approved it yet, unless duplicates count (ALREADY_APPROVED)
   * 5. On the quorum-reaching approval, `options.beforeQuorum` passes
   */
  approveBurnRequest(
    approver: Address,
    requestor: Address,
    id: string,
    options: ApprovalOptions = {},
  ): ApprovalResult {
    this.canBurn(approver);
    const proposal = this.getProposal("burn", requestor, id);

    if (proposal.approved) {
      throw new GovernanceError(
        "PROPOSAL_CLOSED",
        `Burn request with ID '${id}' has already been approved`,
      );
    }
    if (!this.countDuplicateApprovals && proposal.approvals.includes(approver)) {
      throw new GovernanceError(
        "ALREADY_APPROVED",
        `'${approver}' has already approved burn request '${id}'`,
      );
    }

    const approvals = [...proposal.approvals, approver];
    const quorumReached = approvals.length >= this.requiredBurnApprovals;
    const updated: BurnProposal = {
      ...proposal,
      approvals,
      approved: quorumReached,
      ...(quorumReached ? { approvedAt: this.clock() } : {}),
    };

    if (quorumReached) {
      options.beforeQuorum?.(updated);
    }

    this.scope("burn", requestor).set(id, updated);
    return { proposal: updated, quorumReached };
  }

  /**
   * All burn proposals, optionally for one requestor, in creation order.
   */
  listProposals(requestor?: Address): readonly BurnProposal[] {
    const byRequestor = this.proposals.get("burn") ?? new Map<Address, Map<string, BurnProposal>>();
    if (requestor !== undefined) {
      return [...(byRequestor.get(requestor)?.values() ?? [])];
    }
    return [...byRequestor.values()].flatMap((scope) => [...scope.values()]);
  }

  // ─── Membership ──────────────────────────────────────────────────────

  /**
   * @throws GovernanceError MEMBER_EXISTS
   */
  addMember(role: MemberRole, address: Address): GovernanceChangeEvent {
    memberInput.assert(address);
    if (this.members(role).has(address)) {
      throw new GovernanceError("MEMBER_EXISTS", `Address '${address}' is already a ${role}`);
    }

    const event: GovernanceChangeEvent = {
      type: "member_added",
      role,
      address,
      timestamp: this.clock(),
    };

    this.applyEvent(event);
    return event;
  }

  /**
   * @throws GovernanceError MEMBER_NOT_FOUND
   * @throws GovernanceError QUORUM_UNREACHABLE if fewer burners would
   *   remain than the burn approval requirement
   */
  removeMember(role: MemberRole, address: Address): GovernanceChangeEvent {
    const members = this.members(role);
    if (!members.has(address)) {
      throw new GovernanceError("MEMBER_NOT_FOUND", `Address '${address}' is not a ${role}`);
    }

    // Burners only: no mint proposals exist to need a quorum
    const remaining = members.size - 1;
    if (role === "burner" && remaining < this.requiredBurnApprovals) {
      throw new GovernanceError(
        "QUORUM_UNREACHABLE",
        `Cannot remove burner ${address}: remaining burners (${String(remaining)}) ` +
          `would be fewer than required approvals (${String(this.requiredBurnApprovals)})`,
      );
    }

    const event: GovernanceChangeEvent = {
      type: "member_removed",
      role,
      address,
      timestamp: this.clock(),
    };

    this.applyEvent(event);
    return event;
  }

  /**
   * Change the number of approvals a proposal kind needs.
   *
   * @throws ValidationError unless `value` is a positive integer
   * @throws GovernanceError QUORUM_UNREACHABLE if `value` exceeds the
   *   number of members able to approve
   */
  changeRequirement(kind: ProposalKind, value: number): GovernanceChangeEvent {
    requirementInput.assert(value);

    const members = kind === "burn" ? this.burners : this.minters;
    if (members.size > 0 && value > members.size) {
      throw new GovernanceError(
        "QUORUM_UNREACHABLE",
        `Required ${kind} approvals (${String(value)}) cannot exceed the number of members (${String(members.size)})`,
      );
    }

    const event: GovernanceChangeEvent = {
      type: "requirement_changed",
      kind,
      previous: kind === "burn" ? this.requiredBurnApprovals : this.requiredMintApprovals,
      value,
      timestamp: this.clock(),
    };

    this.applyEvent(event);
    return event;
  }

  getMembers(): GovernanceMembers {
    return {
      burners: [...this.burners].sort(),
      minters: [...this.minters].sort(),
    };
  }

  getRequirements(): GovernanceRequirements {
    return {
      requiredBurnApprovals: this.requiredBurnApprovals,
      requiredMintApprovals: this.requiredMintApprovals,
    };
  }

  /**
   * Get the current governance policy snapshot.
   */
  getCurrentPolicy(): GovernancePolicy {
    const members = this.getMembers();
    const requirements = this.getRequirements();
    const policyData = canonicalize({
      version: this.version,
      burners: members.burners,
      minters: members.minters,
      requirements,
    });
    const id = createHash("sha256").update(policyData).digest("hex").slice(0, 16);

    return {
      id,
      version: this.version,
      members,
      requirements,
      updatedAt: this.lastUpdated,
    };
  }

  /**
   * Replay membership history from a sequence of events.
   * Resets members and requirements first; proposals are kept.
   */
  replayFrom(events: readonly GovernanceChangeEvent[]): void {
    this.burners.clear();
    this.minters.clear();
    this.requiredBurnApprovals = 1;
    this.requiredMintApprovals = 1;
    this.version = 0;
    this.events.length = 0;

    for (const event of events) {
      this.applyEvent(event);
    }
  }

  /**
   * Get the full event history.
   */
  getEventHistory(): readonly GovernanceChangeEvent[] {
    return [...this.events];
  }

  // ===========================================================================
  // Private
  // ===========================================================================

  private members(role: MemberRole): Set<Address> {
    return role === "burner" ? this.burners : this.minters;
  }

  private scope(kind: ProposalKind, requestor: Address): Map<string, BurnProposal> {
    let byRequestor = this.proposals.get(kind);
    if (byRequestor === undefined) {
      byRequestor = new Map();
      this.proposals.set(kind, byRequestor);
    }

    let scope = byRequestor.get(requestor);
    if (scope === undefined) {
      scope = new Map();
      byRequestor.set(requestor, scope);
    }
    return scope;
  }

  private applyEvent(event: GovernanceChangeEvent): void {
    switch (event.type) {
      case "member_added":
        this.members(event.role).add(event.address);
        break;

      case "member_removed":
        this.members(event.role).delete(event.address);
        break;

      case "requirement_changed":
        if (event.kind === "burn") {
          this.requiredBurnApprovals = event.value;
        } else {
          this.requiredMintApprovals = event.value;
        }
        break;
    }

    this.version++;
    this.lastUpdated = event.timestamp;
    this.events.push(event);
  }
}
