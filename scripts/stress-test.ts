/**
 * Stress test for the ledger core.
 * 50 players fire 5000 concurrent transfers and race 200 payment requests,
 * 5 payers per request.
 * Verifies: supply conservation, no negative balances, log replay, single redemption.
 *
 * Usage: npm run stress
 * Exit 0 = success, non-zero = failure.
 */

import { InsufficientFundsError, InvalidPaymentRequestError, MemoryLedger } from '@scrip/adapters-ledger';

// ── Config ───────────────────────────────────────────────────
const NUM_PLAYERS = 50;
const NUM_TRANSFERS = 5000;
const NUM_REQUESTS = 200;
const PAYERS_PER_REQUEST = 5;
const STARTING_BALANCE = 10_000n; // 100.00
const MASTER_SEED = 777;
const ADMIN = 'stress-admin';

function createRng(seed: number): () => number {
  let state = seed;
  return () => {
    state = (state * 48271) % 2147483647;
    return state / 2147483647;
  };
}

function pick(rng: () => number, max: number): number {
  return Math.floor(rng() * max);
}

function playerId(i: number): string {
  return `player-${i}`;
}

async function main() {
  console.log('=== Ledger Stress Test ===');
  console.log(`Players: ${NUM_PLAYERS} | Transfers: ${NUM_TRANSFERS} | Requests: ${NUM_REQUESTS} x ${PAYERS_PER_REQUEST} payers`);
  console.log();

  const ledger = new MemoryLedger({ bootstrapAdminId: ADMIN });
  const rng = createRng(MASTER_SEED);

  await ledger.createOrGet(ADMIN);
  for (let i = 0; i < NUM_PLAYERS; i++) {
    await ledger.register(playerId(i), { displayName: `Player ${i}`, gameId: `g-${i}` });
    await ledger.adjust(ADMIN, playerId(i), STARTING_BALANCE, 'credit', 'stress seed');
  }
  const expectedSupply = STARTING_BALANCE * BigInt(NUM_PLAYERS);

  const start = performance.now();
  const errors: string[] = [];
  let rejectedForFunds = 0;

  // ── Transfers ──────────────────────────────────────────
  const transfers = Array.from({ length: NUM_TRANSFERS }, () => {
    const from = playerId(pick(rng, NUM_PLAYERS));
    const to = playerId(pick(rng, NUM_PLAYERS));
    const amount = BigInt(1 + pick(rng, 5_000));
    return ledger.transfer(from, to, amount).catch((err: unknown) => {
      if (err instanceof InsufficientFundsError) {
        rejectedForFunds++;
        return null;
      }
      errors.push(err instanceof Error ? err.message : String(err));
      return null;
    });
  });
  const committed = (await Promise.all(transfers)).filter((tx) => tx !== null).length;

  // ── Payment request races ──────────────────────────────
  let doubleRedemptions = 0;
  for (let r = 0; r < NUM_REQUESTS; r++) {
    const requester = playerId(pick(rng, NUM_PLAYERS));
    const request = await ledger.createPaymentRequest(requester, BigInt(1 + pick(rng, 500)));

    const attempts = Array.from({ length: PAYERS_PER_REQUEST }, () =>
      ledger
        .redeemPaymentRequest(request.token, playerId(pick(rng, NUM_PLAYERS)))
        .then(() => true)
        .catch((err: unknown) => {
          if (!(err instanceof InvalidPaymentRequestError) && !(err instanceof InsufficientFundsError)) {
            errors.push(err instanceof Error ? err.message : String(err));
          }
          return false;
        })
    );
    const wins = (await Promise.all(attempts)).filter(Boolean).length;
    if (wins > 1) doubleRedemptions++;
  }

  const elapsed = performance.now() - start;

  // ── Invariants ─────────────────────────────────────────
  const accounts = ledger.getAllAccounts();
  const transactions = ledger.getAllTransactions();
  const supply = ledger.getTotalBalance();
  const negative = accounts.filter((a) => a.balance < 0n).length;

  let replayMismatches = 0;
  for (const account of accounts) {
    let replayed = 0n;
    for (const tx of transactions) {
      if (tx.toAccountId === account.id) replayed += tx.amount;
      if (tx.fromAccountId === account.id) replayed -= tx.amount;
    }
    if (replayed !== account.balance) replayMismatches++;
  }

  console.log('--- Results ---');
  console.log(`  Transfers committed:  ${committed}`);
  console.log(`  Rejected for funds:   ${rejectedForFunds}`);
  console.log(`  Log entries:          ${transactions.length}`);
  console.log(`  Elapsed time:         ${(elapsed / 1000).toFixed(2)}s`);
  console.log(`  Errors:               ${errors.length}`);

  if (errors.length > 0) {
    console.log();
    console.log('--- Errors (first 10) ---');
    for (const e of errors.slice(0, 10)) {
      console.log(`  ${e}`);
    }
  }

  // ── Verdict ────────────────────────────────────────────
  const checks: Array<[string, boolean]> = [
    ['No unexpected errors', errors.length === 0],
    ['Supply conservation', supply === expectedSupply],
    ['No negative balances', negative === 0],
    ['Log replay', replayMismatches === 0],
    ['Single redemption', doubleRedemptions === 0],
  ];

  console.log();
  console.log('=== Verification ===');
  for (const [name, ok] of checks) {
    console.log(`  ${name.padEnd(22)}${ok ? 'PASS' : 'FAIL'}`);
  }

  const allPass = checks.every(([, ok]) => ok);
  console.log(`\n${allPass ? '*** STRESS TEST PASSED ***' : '*** STRESS TEST FAILED ***'}`);
  process.exit(allPass ? 0 : 1);
}

main().catch((err: unknown) => {
  console.error('Fatal error:', err);
  process.exit(1);
});
