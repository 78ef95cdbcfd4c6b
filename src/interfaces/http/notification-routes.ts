import fp from 'fastify-plugin';
import { z } from 'zod';
import type { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import { notificationRequestSchema, sendNotification } from '../../application/index.js';
import type { TaskStatus } from '../../application/index.js';

const availabilitySchema = z.object({ unavailable: z.boolean() });

/**
 * Notification operator routes.
 *
 * POST   /api/v1/notifications/events         - trigger one notification
 * GET    /api/v1/notifications/availability   - read the availability gate
 * PUT    /api/v1/notifications/availability   - force the broker path off/on
 * GET    /api/v1/notifications/captured       - events captured while bypassed
 * DELETE /api/v1/notifications/captured       - clear the capture buffer
 * GET    /api/v1/notifications/tasks/:taskId  - executor task status
 * GET    /api/v1/notifications/health         - broker connectivity check
 */
async function notificationRoutes(fastify: FastifyInstance): Promise<void> {

  /**
   * Runs the matching notification operation.
   *
   * The service never rejects; the outcome says whether the event was
   * published, sent directly, or dropped.
   */
  fastify.post(
    '/api/v1/notifications/events',
    async (request: FastifyRequest, reply: FastifyReply) => {
      const parsed = notificationRequestSchema.safeParse(request.body);

      if (!parsed.success) {
        return reply.status(400).send({
          error: 'Validation failed',
          issues: parsed.error.issues,
        });
      }

      const outcome = await sendNotification(fastify.notifications.service, parsed.data);

      return reply.status(202).send({ status: 'accepted', outcome });
    },
  );

  fastify.get(
    '/api/v1/notifications/availability',
    async (_request: FastifyRequest, reply: FastifyReply) => {
      const { gate } = fastify.notifications;
      return reply.status(200).send({
        unavailable: gate.isForcedUnavailable(),
        bypass: gate.isBypassActive(),
      });
    },
  );

  fastify.put(
    '/api/v1/notifications/availability',
    async (request: FastifyRequest, reply: FastifyReply) => {
      const parsed = availabilitySchema.safeParse(request.body);

      if (!parsed.success) {
        return reply.status(400).send({
          error: 'Validation failed',
          issues: parsed.error.issues,
        });
      }

      const { gate } = fastify.notifications;
      gate.setUnavailable(parsed.data.unavailable);
      fastify.log.warn({ unavailable: parsed.data.unavailable }, 'Broker availability overridden');

      return reply.status(200).send({
        unavailable: gate.isForcedUnavailable(),
        bypass: gate.isBypassActive(),
      });
    },
  );

  fastify.get(
    '/api/v1/notifications/captured',
    async (_request: FastifyRequest, reply: FastifyReply) => {
      const events = fastify.notifications.captureBuffer.all();
      return reply.status(200).send({ count: events.length, events });
    },
  );

  fastify.delete(
    '/api/v1/notifications/captured',
    async (_request: FastifyRequest, reply: FastifyReply) => {
      fastify.notifications.captureBuffer.clear();
      return reply.status(204).send();
    },
  );

  fastify.get(
    '/api/v1/notifications/tasks/:taskId',
    async (
      request: FastifyRequest<{ Params: { taskId: string } }>,
      reply: FastifyReply,
    ) => {
      let status: TaskStatus | null;
      try {
        status = await fastify.notifications.taskStatus.getStatus(request.params.taskId);
      } catch (err: unknown) {
        request.log.warn({ err, taskId: request.params.taskId }, 'Task status lookup failed');
        return reply.status(503).send({ error: 'Task status unavailable' });
      }
      if (status === null) {
        return reply.status(404).send({ error: 'Task not found' });
      }
      return reply.status(200).send(status);
    },
  );

  fastify.get(
    '/api/v1/notifications/health',
    async (_request: FastifyRequest, reply: FastifyReply) => {
      const healthy = await fastify.notifications.checkBroker();
      if (!healthy) {
        return reply.status(503).send({ status: 'degraded', broker: 'unavailable' });
      }
      return reply.status(200).send({ status: 'ok', broker: 'connected' });
    },
  );
}

export default fp(notificationRoutes, {
  name: 'notification-routes',
  dependencies: ['notifications'],
  fastify: '5.x',
});
