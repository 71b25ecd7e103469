import type { FastifyInstance, FastifyPluginOptions } from "fastify";
import { httpError } from "../lib/httpError.js";
import { RecordId } from "../lib/validation.js";
import type { IngestService } from "../services/ingestService.js";

export interface ProcessedAgentDataRouteOptions extends FastifyPluginOptions {
  ingestService: IngestService;
}

type IdParams = { id: string };

function parseRecordId(raw: unknown): number {
  const parsed = RecordId.safeParse(raw);
  if (!parsed.success) {
    throw httpError(400, "invalid_id", "Record id must be a positive integer");
  }
  return parsed.data;
}

export async function processedAgentDataRoutes(fastify: FastifyInstance, options: ProcessedAgentDataRouteOptions) {
  const { ingestService } = options;

  fastify.post("/processed_agent_data/", async (request, reply) => {
    const result = await ingestService.ingest(request.body);
    return reply.code(201).send(result);
  });

  fastify.get("/processed_agent_data/", async () => ingestService.list());

  fastify.get<{ Params: IdParams }>("/processed_agent_data/:id", async (request) => {
    return ingestService.get(parseRecordId(request.params.id));
  });

  fastify.put<{ Params: IdParams }>("/processed_agent_data/:id", async (request) => {
    return ingestService.update(parseRecordId(request.params.id), request.body);
  });

  fastify.delete<{ Params: IdParams }>("/processed_agent_data/:id", async (request) => {
    return ingestService.remove(parseRecordId(request.params.id));
  });
}
