/**
 * Memory Routes — operational API for the tiered memory.
 *
 * Domain errors map onto HTTP statuses: stale buckets and protection
 * violations are conflicts, unknown users/entries/snapshots are 404s and
 * validation failures 400s. Anything else, storage failures included, is a 500.
 */

import type { FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import { z } from 'zod';
import { SpeakerSchema } from '@tiermind/shared';
import { describeValidationError, sendError, toErrorMessage } from '../utils/errors.js';
import {
  MemoryNotFoundError,
  MemoryValidationError,
  ProtectionViolationError,
  StaleBucketError,
} from './errors.js';
import type { MemoryManager } from './manager.js';

export interface MemoryRoutesOptions {
  memoryManager: MemoryManager;
}

const PREFIX = '/api/v1/memory';

const CreateUserBody = z.object({
  userId: z.string().min(1),
  displayName: z.string().min(1).max(200).optional(),
});
const TurnBody = z.object({
  speaker: SpeakerSchema,
  text: z.string().min(1).max(100_000),
  timestamp: z.number().int().nonnegative().optional(),
});
const ContextBody = z.object({ query: z.string().max(10_000).default('') });
const CleanupAllBody = z.object({ userIds: z.array(z.string().min(1)).optional() }).default({});
const ProtectBody = z.object({ note: z.string().max(500).optional() }).default({});
const RollbackBody = z.object({ generation: z.number().int().nonnegative() });

type UserParams = { Params: { userId: string } };
type EntryParams = { Params: { userId: string; entryId: string } };

function statusFor(error: unknown): number {
  if (error instanceof StaleBucketError || error instanceof ProtectionViolationError) return 409;
  if (error instanceof MemoryNotFoundError) return 404;
  if (error instanceof MemoryValidationError) return 400;
  return 500;
}

function parseBody<T extends z.ZodTypeAny>(schema: T, body: unknown, reply: FastifyReply): z.output<T> | null {
  const result = schema.safeParse(body ?? undefined);
  if (!result.success) {
    void sendError(reply, 400, describeValidationError(result.error));
    return null;
  }
  return result.data;
}

export function registerMemoryRoutes(app: FastifyInstance, opts: MemoryRoutesOptions): void {
  const { memoryManager } = opts;

  const fail = (request: FastifyRequest, reply: FastifyReply, error: unknown) => {
    const status = statusFor(error);
    if (status >= 500) {
      request.log.error({ err: error }, 'Memory request failed');
    }
    return sendError(reply, status, toErrorMessage(error));
  };

  app.get(`${PREFIX}/health`, async () => ({
    status: 'ok',
    cleanupRunning: memoryManager.isCleanupRunning(),
  }));

  app.post(`${PREFIX}/users`, async (request, reply) => {
    const body = parseBody(CreateUserBody, request.body, reply);
    if (!body) return reply;
    try {
      const index = await memoryManager.createUser(body.userId, body.displayName);
      return reply.code(201).send({ index });
    } catch (error) {
      return fail(request, reply, error);
    }
  });

  // ── Turns & context ──────────────────────────────────────────

  app.post(`${PREFIX}/users/:userId/turns`, async (request: FastifyRequest<UserParams>, reply) => {
    const body = parseBody(TurnBody, request.body, reply);
    if (!body) return reply;
    try {
      const turn = await memoryManager.appendTurn(request.params.userId, body.speaker, body.text, body.timestamp);
      return reply.code(201).send({ turn });
    } catch (error) {
      return fail(request, reply, error);
    }
  });

  app.post(`${PREFIX}/users/:userId/context`, async (request: FastifyRequest<UserParams>, reply) => {
    const body = parseBody(ContextBody, request.body, reply);
    if (!body) return reply;
    try {
      const context = await memoryManager.loadContext(request.params.userId, body.query);
      return { context, prompt: memoryManager.formatContext(context) };
    } catch (error) {
      return fail(request, reply, error);
    }
  });

  // ── Cleanup ──────────────────────────────────────────────────

  app.post(`${PREFIX}/users/:userId/cleanup`, async (request: FastifyRequest<UserParams>, reply) => {
    try {
      const report = await memoryManager.forceCleanup(request.params.userId);
      return { report };
    } catch (error) {
      return fail(request, reply, error);
    }
  });

  app.post(`${PREFIX}/cleanup`, async (request, reply) => {
    const body = parseBody(CleanupAllBody, request.body, reply);
    if (!body) return reply;
    try {
      const stats = await memoryManager.runDailyCleanup(body.userIds);
      return { stats };
    } catch (error) {
      return fail(request, reply, error);
    }
  });

  // ── Protection ───────────────────────────────────────────────

  app.post(`${PREFIX}/users/:userId/protected/:entryId`, async (request: FastifyRequest<EntryParams>, reply) => {
    const body = parseBody(ProtectBody, request.body, reply);
    if (!body) return reply;
    try {
      const fact = await memoryManager.protect(request.params.userId, request.params.entryId, body.note);
      return { fact };
    } catch (error) {
      return fail(request, reply, error);
    }
  });

  app.delete(`${PREFIX}/users/:userId/protected/:entryId`, async (request: FastifyRequest<EntryParams>, reply) => {
    try {
      await memoryManager.unprotect(request.params.userId, request.params.entryId);
      return reply.code(204).send();
    } catch (error) {
      return fail(request, reply, error);
    }
  });

  // ── Index ────────────────────────────────────────────────────

  app.get(`${PREFIX}/users/:userId/snapshots`, async (request: FastifyRequest<UserParams>, reply) => {
    try {
      const snapshots = await memoryManager.listSnapshots(request.params.userId);
      return { snapshots };
    } catch (error) {
      return fail(request, reply, error);
    }
  });

  app.post(`${PREFIX}/users/:userId/rollback`, async (request: FastifyRequest<UserParams>, reply) => {
    const body = parseBody(RollbackBody, request.body, reply);
    if (!body) return reply;
    try {
      const index = await memoryManager.rollbackIndex(request.params.userId, body.generation);
      return { index };
    } catch (error) {
      return fail(request, reply, error);
    }
  });

  app.get(`${PREFIX}/users/:userId/stats`, async (request: FastifyRequest<UserParams>, reply) => {
    try {
      const stats = await memoryManager.getStats(request.params.userId);
      return { stats };
    } catch (error) {
      return fail(request, reply, error);
    }
  });

  app.get(`${PREFIX}/users/:userId/index`, async (request: FastifyRequest<UserParams>, reply) => {
    try {
      const index = await memoryManager.getIndex(request.params.userId);
      return { index };
    } catch (error) {
      return fail(request, reply, error);
    }
  });
}
