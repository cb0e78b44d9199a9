#!/usr/bin/env node
/**
 * @ledgerkit/demo — Interactive CLI walkthrough.
 *
 * Runs the token lifecycle in your terminal:
 * boot -> info -> mint -> transfer -> rejected transfer ->
 * burn request -> approvals -> external transfer -> snapshot
 *
 * Uses the real process package with an in-memory outbox.
 */

import chalk from "chalk";
import { pino } from "pino";
import type { InboundMessage, OutboundMessage } from "@ledgerkit/types";
import { fromSubUnits, toSubUnits } from "@ledgerkit/ledger";
import { MemoryOutbox, createTokenProcess, loadConfig } from "@ledgerkit/process";
import type { HandleResult } from "@ledgerkit/process";

// =============================================================================
// Helpers
// =============================================================================

const DELAY_MS = 600;

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function address(name: string): string {
  return name.padEnd(43, "_");
}

const ALICE = address("alice");
const BOB = address("bob");
const MINTER = address("treasury-minter");
const BURNER_1 = address("burner-one");
const BURNER_2 = address("burner-two");
const BRIDGE = "bridge-process";

let _messageSeq = 0;

function message(from: string, tags: Record<string, string>): InboundMessage {
  _messageSeq++;
  return { id: `demo-${_messageSeq}`, from, tags };
}

function banner(): void {
  console.log();
  console.log(chalk.cyan.bold("  ╔══════════════════════════════════════════════════════════╗"));
  console.log(chalk.cyan.bold("  ║") + chalk.white.bold("                     LEDGERKIT DEMO                       ") + chalk.cyan.bold("║"));
  console.log(chalk.cyan.bold("  ║") + chalk.gray("        Token ledger with burn governance                 ") + chalk.cyan.bold("║"));
  console.log(chalk.cyan.bold("  ╚══════════════════════════════════════════════════════════╝"));
  console.log();
}

function stepHeader(step: number, total: number, title: string): void {
  const prefix = chalk.cyan.bold(`  Step ${step}/${total}`);
  const line = chalk.gray("─".repeat(Math.max(2, 50 - title.length)));
  console.log(`\n${prefix}  ${chalk.white.bold(title)}  ${line}`);
}

function ok(msg: string): void {
  console.log(chalk.green("    ✓ ") + chalk.white(msg));
}

function info(label: string, value: string): void {
  console.log(chalk.gray("    → ") + chalk.gray(label.padEnd(22)) + chalk.white(value));
}

function warn(msg: string): void {
  console.log(chalk.yellow("    ! ") + chalk.yellow(msg));
}

function short(value: string): string {
  return value.length > 16 ? `${value.slice(0, 10)}...${value.slice(-4)}` : value;
}

function output(result: HandleResult): void {
  if (result.status === "ok") {
    for (const [key, value] of Object.entries(result.output)) {
      info(key, short(value));
    }
  } else if (result.status === "error") {
    warn(`${result.error.code}: ${result.error.message}`);
  } else {
    warn("Message not handled");
  }
}

function notices(list: readonly OutboundMessage[]): void {
  for (const notice of list) {
    const action = notice.tags["Action"] ?? "(data)";
    console.log(chalk.gray("    ✉ ") + chalk.magenta(action.padEnd(22)) + chalk.gray(`→ ${short(notice.target)}`));
  }
}

const TOTAL_STEPS = 9;

// =============================================================================
// Demo
// =============================================================================

async function run(): Promise<void> {
  banner();
  console.log(chalk.gray("  Walk-through of a token process lifecycle."));
  console.log(chalk.gray("  Every step uses the real packages — no mocks.\n"));

  await sleep(DELAY_MS);

  // ─── Step 1: Boot ───────────────────────────────────────────────────

  stepHeader(1, TOTAL_STEPS, "Boot");

  const denomination = 6;
  const config = loadConfig({
    NODE_ENV: "test",
    LOG_LEVEL: "silent",
    TOKEN_NAME: "Demo Token",
    TOKEN_TICKER: "DMO",
    TOKEN_DENOMINATION: String(denomination),
    INITIAL_BALANCES: `${ALICE}:${toSubUnits("100", denomination).toString()}`,
    MINTERS: MINTER,
    BURNERS: `${BURNER_1},${BURNER_2}`,
    REQUIRED_BURN_APPROVALS: "2",
    AUTHORIZED_EXTERNAL_TARGETS: BRIDGE,
  });
  const outbox = new MemoryOutbox();
  const tokenProcess = createTokenProcess(config, {
    logger: pino({ level: config.LOG_LEVEL }),
    sink: outbox,
  });

  ok("Token initialized (DMO, 6 decimals)");
  ok("Governance: 2 burners, 2 approvals required");
  ok(`External targets: ${tokenProcess.gate.targets().join(", ")}`);

  await sleep(DELAY_MS);

  // Each step clears the outbox so only its own notices are shown
  const send = (from: string, tags: Record<string, string>): HandleResult => {
    outbox.clear();
    const result = tokenProcess.handle(message(from, tags));
    output(result);
    notices(outbox.messages);
    return result;
  };

  // ─── Step 2: Info ───────────────────────────────────────────────────

  stepHeader(2, TOTAL_STEPS, "Token Info");
  send(ALICE, { Action: "Info" });

  await sleep(DELAY_MS);

  // ─── Step 3: Mint ───────────────────────────────────────────────────

  stepHeader(3, TOTAL_STEPS, "Mint");
  const minted = toSubUnits("20", denomination);
  send(MINTER, { Action: "Mint", Target: BOB, Quantity: minted.toString() });
  ok(`Minted ${fromSubUnits(minted, denomination)} DMO to bob`);

  await sleep(DELAY_MS);

  // ─── Step 4: Transfer ───────────────────────────────────────────────

  stepHeader(4, TOTAL_STEPS, "Transfer");
  send(ALICE, {
    Action: "Transfer",
    Recipient: BOB,
    Quantity: toSubUnits("12.5", denomination).toString(),
  });
  ok("Debit and credit notices emitted after commit");

  await sleep(DELAY_MS);

  // ─── Step 5: Rejected Transfer ──────────────────────────────────────

  stepHeader(5, TOTAL_STEPS, "Rejected Transfer");
  send(BOB, {
    Action: "Transfer",
    Recipient: ALICE,
    Quantity: toSubUnits("1000", denomination).toString(),
  });
  ok("No balance changed; caller received an error notice");

  await sleep(DELAY_MS);

  // ─── Step 6: Burn Request ───────────────────────────────────────────

  stepHeader(6, TOTAL_STEPS, "Burn Request");
  const request = send(ALICE, {
    Action: "Burn",
    Quantity: toSubUnits("10", denomination).toString(),
  });
  const requestId = request.status === "ok" ? request.output["burn_request_id"] : undefined;
  if (requestId === undefined) {
    throw new Error("Burn request was not created");
  }

  await sleep(DELAY_MS);

  // ─── Step 7: Approvals ──────────────────────────────────────────────

  stepHeader(7, TOTAL_STEPS, "Approvals (2 of 2)");
  const approval = {
    Action: "Burn",
    "Action-Type": "APPROVAL",
    Requestor: ALICE,
    "Burn-Request-Id": requestId,
  };
  send(BURNER_1, approval);
  send(BURNER_2, approval);
  ok("Quorum reached; burn executed once");
  send(BURNER_1, approval);

  await sleep(DELAY_MS);

  // ─── Step 8: External Transfer ──────────────────────────────────────

  stepHeader(8, TOTAL_STEPS, "External Transfer");
  send(BOB, {
    Action: "Transfer",
    "Action-Type": "EXTERNAL",
    Process: BRIDGE,
    Recipient: ALICE,
    Quantity: toSubUnits("2", denomination).toString(),
  });
  ok("Debited locally; credit notice addressed to the bridge");

  await sleep(DELAY_MS);

  // ─── Step 9: Snapshot ───────────────────────────────────────────────

  stepHeader(9, TOTAL_STEPS, "Snapshot");

  const snapshot = tokenProcess.token.snapshot();
  const policy = tokenProcess.governance.getCurrentPolicy();

  console.log();
  for (const [holder, balance] of Object.entries(snapshot.balances)) {
    console.log(
      chalk.white(`    ${short(holder).padEnd(22)}`) +
        chalk.cyan.bold(`${fromSubUnits(BigInt(balance), denomination)} DMO`),
    );
  }
  console.log();
  console.log(chalk.white("    Total supply:        ") + chalk.cyan.bold(`${fromSubUnits(tokenProcess.token.totalSupply(), denomination)} DMO`));
  console.log(chalk.white("    Burn proposals:      ") + chalk.cyan.bold(String(tokenProcess.governance.listProposals().length)));
  console.log(chalk.white("    Governance policy:   ") + chalk.yellow(`${policy.id} (v${policy.version})`));

  console.log();
  console.log(chalk.gray("    Every mutation is validated before it is written,"));
  console.log(chalk.gray("    and every burn needs its approvals."));
  console.log();
}

run().catch((err: unknown) => {
  console.error(chalk.red("\n  Demo failed:"), err);
  process.exit(1);
});
