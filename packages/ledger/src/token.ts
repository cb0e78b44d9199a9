/**
 * @ledgerkit/ledger — Token ledger core.
 *
 * Owns the token metadata and the address → quantity balance map.
 * Every mutation validates all of its inputs and preconditions before
 * writing, so a failed call leaves no trace.
 *
 * API surface:
 * - init() — Set metadata and initial balances (once)
 * - info() / balance() / balances() / totalSupply() — Queries
 * - mint() / burn() / transfer() — Balance mutations
 * - assertCanBurn() — Burn preflight without mutation
 * - transferOut() — Debit-only transfer (used by the external gate)
 * - snapshot() / fromSnapshot() — Serialize and restore state
 *
 * Authorization is not checked here; callers decide who may mint or burn.
 */

import type {
  Address,
  BalanceChange,
  Quantity,
  QuantityString,
  TokenInfo,
  TokenMetadata,
  TransferResult,
} from "@ledgerkit/types";
import { isAddress, isQuantityString, isTokenMetadata } from "@ledgerkit/types";
import {
  Type,
  Validator,
  addressType,
  balanceType,
  quantityType,
} from "@ledgerkit/validation";
import {
  addQuantity,
  compareQuantity,
  formatQuantity,
  subtractQuantity,
  sumQuantities,
} from "./quantity.js";
import type { InitialBalances, TokenSnapshot } from "./types.js";
import { LedgerError } from "./types.js";

// ─── Input Types ─────────────────────────────────────────────────────────

const CREATE = "Cannot create token.";

const metadataType = Type.object({
  name: Type.string(`${CREATE} Field \`name\` must be a string.`),
  ticker: Type.string(`${CREATE} Field \`ticker\` must be a string.`),
  denomination: Type.number(`${CREATE} Field \`denomination\` must be a number.`)
    .integer(`${CREATE} Field \`denomination\` must be an integer.`)
    .greaterThan(0, `${CREATE} Field \`denomination\` must be greater than 0.`),
  logo: Type.optional(Type.string(`${CREATE} Field \`logo\` must be a string.`)),
}).setName("metadata");

const initialBalance = new Validator({
  address: addressType(CREATE, "Balance address"),
  quantity: balanceType(CREATE, "Balance quantity"),
});

const balanceQuery = addressType("Cannot get token balance.", "Target address");

const mintInput = new Validator({
  target: addressType("Cannot mint tokens.", "Target address"),
  quantity: quantityType("Cannot mint tokens.", "Quantity"),
});

const burnInput = new Validator({
  target: addressType("Cannot burn tokens.", "Target address"),
  quantity: quantityType("Cannot burn tokens.", "Quantity"),
});

const transferInput = new Validator({
  sender: addressType("Cannot transfer tokens.", "Sender address"),
  recipient: addressType("Cannot transfer tokens.", "Recipient address"),
  quantity: quantityType("Cannot transfer tokens.", "Quantity"),
});

const transferOutInput = new Validator({
  sender: addressType("Cannot process external transfer.", "Sender address"),
  quantity: quantityType("Cannot process external transfer.", "Quantity"),
});

function byAddress([a]: readonly [Address, unknown], [b]: readonly [Address, unknown]): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

function isBalanceMap(balances: InitialBalances): balances is ReadonlyMap<Address, Quantity> {
  return balances instanceof Map;
}

function entriesOf(balances: InitialBalances): [string, unknown][] {
  return isBalanceMap(balances) ? [...balances.entries()] : Object.entries(balances);
}

// =============================================================================
// Token
// =============================================================================

/**
 * A fungible-token ledger.
 *
 * Balances are arbitrary-precision integers in the token's smallest
 * unit. An address with no entry has a balance of zero; an entry, once
 * created, is kept even when it drops to zero.
 */
export class Token {
  private _metadata: TokenMetadata | undefined;
  private readonly _balances: Map<Address, Quantity> = new Map();

  // ─── Lifecycle ───────────────────────────────────────────────────────

  get isInitialized(): boolean {
    return this._metadata !== undefined;
  }

  /**
   * Set metadata and initial balances.
   *
   * Validation rules (all must pass):
   * 1. The token must not be initialized yet
   * 2. name and ticker are strings, denomination a positive integer
   * 3. logo, when present, is a string
   * 4. Every initial balance maps a valid address to a non-negative quantity
   */
  init(metadata: TokenMetadata, initialBalances: InitialBalances = {}): void {
    if (this._metadata !== undefined) {
      throw new LedgerError(
        "ALREADY_INITIALIZED",
        `${CREATE} Token '${this._metadata.ticker}' is already initialized.`,
      );
    }

    const validated = metadataType.assert(metadata);

    const entries = entriesOf(initialBalances);
    const balances: [Address, Quantity][] = [];
    for (const [address, quantity] of entries) {
      const checked = initialBalance.validateTypes({ address, quantity }, ["address", "quantity"]);
      balances.push([checked.address, checked.quantity]);
    }

    this._metadata = {
      name: validated.name,
      ticker: validated.ticker,
      denomination: validated.denomination,
      ...(validated.logo !== undefined ? { logo: validated.logo } : {}),
    };
    for (const [address, quantity] of balances) {
      this._balances.set(address, quantity);
    }
  }

  // ─── Queries ─────────────────────────────────────────────────────────

  info(): TokenInfo {
    const metadata = this.requireMetadata("Cannot get token info.");
    return {
      name: metadata.name,
      ticker: metadata.ticker,
      denomination: String(metadata.denomination),
      logo: metadata.logo ?? "",
    };
  }

  get ticker(): string {
    return this.requireMetadata("Cannot get token ticker.").ticker;
  }

  get denomination(): number {
    return this.requireMetadata("Cannot get token denomination.").denomination;
  }

  /**
   * Balance for an address, or undefined if it has never held tokens.
   */
  balance(address: Address): Quantity | undefined {
    this.requireMetadata("Cannot get token balance.");
    balanceQuery.assert(address);
    return this._balances.get(address);
  }

  /**
   * Copy of all balances, sorted by address.
   * Empty when the token is not initialized.
   */
  balances(): ReadonlyMap<Address, Quantity> {
    return new Map([...this._balances.entries()].sort(byAddress));
  }

  totalSupply(): Quantity {
    this.requireMetadata("Cannot get total supply.");
    return sumQuantities(this._balances.values());
  }

  // ─── Mutations ───────────────────────────────────────────────────────

  /**
   * Credit `quantity` to `target`, creating the entry if needed.
   */
  mint(target: Address, quantity: Quantity): BalanceChange {
    this.requireMetadata("Cannot mint tokens.");
    mintInput.validateTypes({ target, quantity }, ["target", "quantity"]);

    const balanceOld = this._balances.get(target) ?? 0n;
    const balanceNew = addQuantity(balanceOld, quantity);
    this._balances.set(target, balanceNew);

    return { target, balanceOld, balanceNew };
  }

  /**
   * Check that `target` could burn `quantity` right now.
   * Returns the current balance. Nothing is written.
   */
  assertCanBurn(target: Address, quantity: Quantity): Quantity {
    const metadata = this.requireMetadata("Cannot burn tokens.");
    burnInput.validateTypes({ target, quantity }, ["target", "quantity"]);

    const balance = this._balances.get(target);
    if (balance === undefined) {
      throw new LedgerError(
        "NO_BALANCE",
        `Cannot burn tokens. No balance for address '${target}' found.`,
      );
    }
    if (compareQuantity(balance, quantity) < 0) {
      throw new LedgerError(
        "INSUFFICIENT_BALANCE",
        `Cannot burn ${formatQuantity(quantity)} ${metadata.ticker}. Target address '${target}' has insufficient balance: ${formatQuantity(balance)}.`,
      );
    }
    return balance;
  }

  /**
   * Remove `quantity` from `target`.
   */
  burn(target: Address, quantity: Quantity): BalanceChange {
    const balanceOld = this.assertCanBurn(target, quantity);
    const balanceNew = subtractQuantity(balanceOld, quantity);
    this._balances.set(target, balanceNew);

    return { target, balanceOld, balanceNew };
  }

  /**
   * Move `quantity` from `sender` to `recipient`.
   * The sender keeps its entry even when the balance reaches zero.
   */
  transfer(sender: Address, recipient: Address, quantity: Quantity): TransferResult {
    this.requireMetadata("Cannot transfer tokens.");
    transferInput.validateTypes({ sender, recipient, quantity }, ["sender", "recipient", "quantity"]);

    if (sender === recipient) {
      throw new LedgerError(
        "SELF_TRANSFER",
        "Cannot transfer tokens. Sender address cannot be the same as the Recipient address.",
      );
    }

    const senderBalanceOld = this.debitable("Cannot transfer tokens.", sender, quantity);
    const recipientBalanceOld = this._balances.get(recipient) ?? 0n;
    const senderBalanceNew = subtractQuantity(senderBalanceOld, quantity);
    const recipientBalanceNew = addQuantity(recipientBalanceOld, quantity);

    this._balances.set(recipient, recipientBalanceNew);
    this._balances.set(sender, senderBalanceNew);

    return {
      sender,
      recipient,
      senderBalanceOld,
      senderBalanceNew,
      recipientBalanceOld,
      recipientBalanceNew,
    };
  }

  /**
   * Debit `sender` without crediting anyone on this ledger.
   * The counterpart credit happens on another process.
   */
  transferOut(sender: Address, quantity: Quantity): BalanceChange {
    const context = "Cannot process external transfer.";
    this.requireMetadata(context);
    transferOutInput.validateTypes({ sender, quantity }, ["sender", "quantity"]);

    const balanceOld = this.debitable(context, sender, quantity);
    const balanceNew = subtractQuantity(balanceOld, quantity);
    this._balances.set(sender, balanceNew);

    return { target: sender, balanceOld, balanceNew };
  }

  // ─── Snapshot ────────────────────────────────────────────────────────

  /**
   * Serialize metadata and balances.
   */
  snapshot(timestamp?: string): TokenSnapshot {
    const metadata = this.requireMetadata("Cannot snapshot token.");
    const balances: Record<Address, QuantityString> = {};
    for (const [address, quantity] of this.balances()) {
      balances[address] = formatQuantity(quantity);
    }

    return {
      version: 1,
      metadata,
      balances,
      createdAt: timestamp ?? new Date().toISOString(),
    };
  }

  /**
   * Restore a token from a snapshot. The state is replayed through
   * `init()`, so every balance is validated again.
   */
  static fromSnapshot(snapshot: TokenSnapshot): Token {
    if (snapshot.version !== 1) {
      throw new LedgerError(
        "INVALID_SNAPSHOT",
        `Unsupported snapshot version: ${String(snapshot.version)}`,
      );
    }
    if (!isTokenMetadata(snapshot.metadata)) {
      throw new LedgerError("INVALID_SNAPSHOT", "Snapshot metadata is malformed");
    }

    const balances = new Map<Address, Quantity>();
    for (const [address, quantity] of Object.entries(snapshot.balances)) {
      if (!isAddress(address) || !isQuantityString(quantity)) {
        throw new LedgerError(
          "INVALID_SNAPSHOT",
          `Snapshot balance for '${address}' is malformed: "${String(quantity)}"`,
        );
      }
      balances.set(address, BigInt(quantity));
    }

    const token = new Token();
    token.init(snapshot.metadata, balances);
    return token;
  }

  // ─── Internal ────────────────────────────────────────────────────────

  private requireMetadata(context: string): TokenMetadata {
    if (this._metadata === undefined) {
      throw new LedgerError("NOT_INITIALIZED", `${context} Token is not initialized.`);
    }
    return this._metadata;
  }

  private debitable(context: string, sender: Address, quantity: Quantity): Quantity {
    const balance = this._balances.get(sender);
    if (balance === undefined) {
      throw new LedgerError(
        "NO_BALANCE",
        `${context} No balance for Sender address '${sender}' found.`,
      );
    }
    if (compareQuantity(balance, quantity) < 0) {
      throw new LedgerError(
        "INSUFFICIENT_BALANCE",
        `${context} Sender address '${sender}' has insufficient balance.`,
      );
    }
    return balance;
  }
}
