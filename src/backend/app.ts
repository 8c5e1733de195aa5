import Fastify, { type FastifyInstance } from 'fastify';
import { z } from 'zod';
import { describeIssues } from '../tools/schemas';
import toolSchema from './tool-schema.json';
import { createToolHandlers, type ToolServerDeps } from './tools';

const runToolBody = z.object({
  tool: z.string().min(1),
  params: z.record(z.unknown()).default({})
});

type ToolServerOptions = ToolServerDeps & {
  logger?: boolean;
};

/**
 * HTTP front of the tool backend:
 *   POST /run_tool  {"tool", "params"} -> {"tool", "response"}
 *   GET  /schema    static tool description document
 *   GET  /health
 */
export function buildToolServer(opts: ToolServerOptions): FastifyInstance {
  const server = Fastify({ logger: opts.logger ?? false });
  const handlers = createToolHandlers(opts);

  server.post('/run_tool', async (req, reply) => {
    const body = runToolBody.safeParse(req.body);
    if (!body.success) {
      return reply.code(400).send({ detail: describeIssues(body.error) });
    }
    const { tool, params } = body.data;
    const handler = handlers.get(tool);
    if (!handler) {
      return reply.code(404).send({ detail: `Tool '${tool}' not found` });
    }
    try {
      const response = await handler(params);
      return { tool, response };
    } catch (err) {
      req.log.error(err, 'tool failed');
      return reply.code(500).send({ detail: `Tool '${tool}' failed` });
    }
  });

  server.get('/schema', async () => toolSchema);

  server.get('/health', async () => ({ status: 'ok', tools: [...handlers.keys()] }));

  return server;
}
