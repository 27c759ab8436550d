import { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import { z } from 'zod';
import { v4 as uuidv4 } from 'uuid';
import { postprocessBatch, postprocessPassport } from '../services/postprocess';
import { listCountryRules } from '../validation-engine/rule-registry';
import { batchPostprocessSchema, postprocessSchema } from './schemas';

export async function passportRoutes(fastify: FastifyInstance) {
  fastify.get('/api/v1/country-rules', async (_request: FastifyRequest, reply: FastifyReply) => {
    return reply.send({ countries: listCountryRules() });
  });

  fastify.post('/api/v1/passports/postprocess', async (request: FastifyRequest, reply: FastifyReply) => {
    try {
      const body = postprocessSchema.parse(request.body);
      const documentRef = body.documentRef ?? uuidv4();
      const record = postprocessPassport(body.observations, { documentRef });
      return reply.send({ documentRef, fields: record.fields, confidences: record.confidences });
    } catch (error) {
      if (error instanceof z.ZodError) {
        return reply.code(400).send({ error: 'Invalid request body', details: error.errors });
      }
      fastify.log.error(error);
      return reply.code(500).send({ error: 'Internal server error' });
    }
  });

  fastify.post(
    '/api/v1/passports/postprocess/batch',
    async (request: FastifyRequest, reply: FastifyReply) => {
      try {
        const body = batchPostprocessSchema.parse(request.body);
        const results = postprocessBatch(body.documents).map((result) =>
          result.ok
            ? {
                documentRef: result.documentRef,
                ok: true,
                fields: result.record.fields,
                confidences: result.record.confidences,
              }
            : result
        );
        return reply.send({ results });
      } catch (error) {
        if (error instanceof z.ZodError) {
          return reply.code(400).send({ error: 'Invalid request body', details: error.errors });
        }
        fastify.log.error(error);
        return reply.code(500).send({ error: 'Internal server error' });
      }
    }
  );
}
