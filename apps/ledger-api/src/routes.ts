import type { FastifyInstance } from 'fastify';
import {
  AccountNotFoundError,
  LedgerUnavailableError,
  UnauthorizedError,
  parseAmount,
  formatAmount,
  tokenPreview,
  type Account,
  type Ledger,
} from '@scrip/adapters-ledger';
import { logger } from './logger.js';
import {
  CreateAccountBodySchema,
  RegistrationBodySchema,
  LookupQuerySchema,
  HistoryQuerySchema,
  TransferBodySchema,
  AdjustmentBodySchema,
  DeleteAccountBodySchema,
  AdminListQuerySchema,
  CreatePaymentRequestBodySchema,
  RedeemBodySchema,
  formatZodError,
} from './schemas.js';
import {
  serializeAccount,
  serializeHistoryEntry,
  serializePaymentRequest,
  serializeTransaction,
} from './serializers.js';

interface Deps {
  ledger: Ledger;
}

interface AccountParams {
  externalId: string;
}

interface TokenParams {
  token: string;
}

export function registerRoutes(app: FastifyInstance, deps: Deps): void {
  const { ledger } = deps;

  async function requireAccount(externalId: string): Promise<Account> {
    const account = await ledger.resolve(externalId);
    if (!account) {
      throw new AccountNotFoundError(externalId);
    }
    return account;
  }

  // Liveness
  app.get('/healthz', async () => ({ status: 'ok' }));

  // Readiness: one cheap read against the store
  app.get('/readyz', async (_, reply) => {
    try {
      await ledger.listActiveAccounts(1);
    } catch (err) {
      if (err instanceof LedgerUnavailableError) {
        return reply.status(503).send({ status: 'not_ready', reason: 'Ledger store unavailable' });
      }
      throw err;
    }
    return { status: 'ready' };
  });

  // ── Accounts ─────────────────────────────────────────────

  app.post('/api/accounts', async (req, reply) => {
    const parseResult = CreateAccountBodySchema.safeParse(req.body);
    if (!parseResult.success) {
      return reply.status(400).send(formatZodError(parseResult.error));
    }
    const body = parseResult.data;
    const account = await ledger.createOrGet(body.externalId, body.handle);
    return { account: serializeAccount(account) };
  });

  app.post<{ Params: AccountParams }>('/api/accounts/:externalId/registration', async (req, reply) => {
    const parseResult = RegistrationBodySchema.safeParse(req.body);
    if (!parseResult.success) {
      return reply.status(400).send(formatZodError(parseResult.error));
    }
    const account = await ledger.register(req.params.externalId, parseResult.data);
    logger.info({ externalId: account.externalId, gameId: account.gameId }, 'Account registered');
    return { account: serializeAccount(account) };
  });

  app.get('/api/accounts/lookup', async (req, reply) => {
    const parseResult = LookupQuerySchema.safeParse(req.query);
    if (!parseResult.success) {
      return reply.status(400).send(formatZodError(parseResult.error));
    }
    const query = parseResult.data;

    let account: Account | null = null;
    if (query.handle !== undefined) {
      account = await ledger.resolveByHandle(query.handle);
    } else if (query.displayName !== undefined) {
      account = await ledger.resolveByDisplayName(query.displayName);
    } else if (query.gameId !== undefined) {
      account = await ledger.resolveByGameId(query.gameId);
    }

    if (!account) {
      return reply.status(404).send({ error: 'NOT_FOUND', message: 'No matching account' });
    }
    return { account: serializeAccount(account) };
  });

  app.get<{ Params: AccountParams }>('/api/accounts/:externalId', async (req) => {
    const account = await requireAccount(req.params.externalId);
    return { account: serializeAccount(account) };
  });

  app.get<{ Params: AccountParams }>('/api/accounts/:externalId/balance', async (req) => {
    const balance = await ledger.getBalance(req.params.externalId);
    return { externalId: req.params.externalId, balance: formatAmount(balance) };
  });

  app.get<{ Params: AccountParams }>('/api/accounts/:externalId/transactions', async (req, reply) => {
    const parseResult = HistoryQuerySchema.safeParse(req.query);
    if (!parseResult.success) {
      return reply.status(400).send(formatZodError(parseResult.error));
    }
    const entries = await ledger.getHistory(req.params.externalId, parseResult.data.limit);
    return { transactions: entries.map(serializeHistoryEntry) };
  });

  // ── Transfers ────────────────────────────────────────────

  app.post('/api/transfers', async (req, reply) => {
    const parseResult = TransferBodySchema.safeParse(req.body);
    if (!parseResult.success) {
      return reply.status(400).send(formatZodError(parseResult.error));
    }
    const body = parseResult.data;
    const amount = parseAmount(body.amount);

    const tx = await ledger.transfer(body.from, body.to, amount, body.note);
    logger.info(
      { txId: tx.id, from: body.from, to: body.to, amount: formatAmount(amount) },
      'Transfer committed'
    );
    return reply.status(201).send({ transaction: serializeTransaction(tx) });
  });

  // ── Admin ────────────────────────────────────────────────

  app.post('/api/admin/adjustments', async (req, reply) => {
    const parseResult = AdjustmentBodySchema.safeParse(req.body);
    if (!parseResult.success) {
      return reply.status(400).send(formatZodError(parseResult.error));
    }
    const body = parseResult.data;
    const amount = parseAmount(body.amount);

    const tx = await ledger.adjust(body.adminId, body.targetId, amount, body.direction, body.note);
    const balance = await ledger.getBalance(body.targetId);
    logger.info(
      { txId: tx.id, adminId: body.adminId, targetId: body.targetId, kind: tx.kind },
      'Admin adjustment committed'
    );
    return reply.status(201).send({
      transaction: serializeTransaction(tx),
      balance: formatAmount(balance),
    });
  });

  app.post<{ Params: AccountParams }>('/api/admin/accounts/:externalId/delete', async (req, reply) => {
    const parseResult = DeleteAccountBodySchema.safeParse(req.body);
    if (!parseResult.success) {
      return reply.status(400).send(formatZodError(parseResult.error));
    }
    const account = await ledger.softDelete(parseResult.data.adminId, req.params.externalId);
    logger.info({ adminId: parseResult.data.adminId, externalId: account.externalId }, 'Account deleted');
    return { account: serializeAccount(account) };
  });

  app.get('/api/admin/accounts', async (req, reply) => {
    const parseResult = AdminListQuerySchema.safeParse(req.query);
    if (!parseResult.success) {
      return reply.status(400).send(formatZodError(parseResult.error));
    }
    const query = parseResult.data;

    const admin = await ledger.resolve(query.adminId);
    if (!admin || !admin.isAdmin || admin.deleted) {
      throw new UnauthorizedError(query.adminId);
    }

    const accounts = await ledger.listActiveAccounts(query.limit);
    return { accounts: accounts.map(serializeAccount) };
  });

  // ── Payment requests ─────────────────────────────────────

  app.post('/api/payment-requests', async (req, reply) => {
    const parseResult = CreatePaymentRequestBodySchema.safeParse(req.body);
    if (!parseResult.success) {
      return reply.status(400).send(formatZodError(parseResult.error));
    }
    const body = parseResult.data;
    const amount = body.amount === undefined ? null : parseAmount(body.amount);

    const request = await ledger.createPaymentRequest(body.requesterId, amount);
    logger.info(
      { token: tokenPreview(request.token), requesterId: body.requesterId, fixed: amount !== null },
      'Payment request created'
    );
    return reply.status(201).send({ request: serializePaymentRequest(request) });
  });

  app.get<{ Params: TokenParams }>('/api/payment-requests/:token', async (req, reply) => {
    const view = await ledger.inspectPaymentRequest(req.params.token);
    if (!view) {
      return reply.status(404).send({ error: 'NOT_FOUND', message: 'Payment request not found' });
    }
    return {
      status: view.status,
      request: serializePaymentRequest(view.request),
      requester: view.requester,
    };
  });

  app.post<{ Params: TokenParams }>('/api/payment-requests/:token/redeem', async (req, reply) => {
    const parseResult = RedeemBodySchema.safeParse(req.body);
    if (!parseResult.success) {
      return reply.status(400).send(formatZodError(parseResult.error));
    }
    const body = parseResult.data;
    const amount = body.amount === undefined ? null : parseAmount(body.amount);

    const redemption = await ledger.redeemPaymentRequest(req.params.token, body.payerId, amount);
    logger.info(
      {
        token: tokenPreview(req.params.token),
        payerId: body.payerId,
        txId: redemption.transaction.id,
        amount: formatAmount(redemption.amount),
      },
      'Payment request redeemed'
    );
    return {
      request: serializePaymentRequest(redemption.request),
      transaction: serializeTransaction(redemption.transaction),
      amount: formatAmount(redemption.amount),
    };
  });
}
