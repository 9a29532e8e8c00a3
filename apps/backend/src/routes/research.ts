import type { FastifyPluginAsync } from "fastify";
import { z } from "zod";
import { PRIVACY_MODES, type ResearchOrchestrator, type SequencedEvent } from "core";

const IsoDate = z.string().regex(/^\d{4}-\d{2}-\d{2}$/, "expected YYYY-MM-DD");

const SearchFiltersBody = z.object({
  dateFrom: IsoDate.optional(),
  dateTo: IsoDate.optional(),
  country: z.string().length(2).optional(),
  language: z.string().length(2).optional(),
  includeDomains: z.array(z.string().min(1)).optional(),
  excludeDomains: z.array(z.string().min(1)).optional(),
});

const CreateResearchBody = z.object({
  query: z.string().trim().min(1, "query must not be empty"),
  privacyMode: z.enum(PRIVACY_MODES).optional(),
  domain: z.string().min(1).optional(),
  requireApproval: z.boolean().optional(),
  filters: SearchFiltersBody.optional(),
});

const SessionParams = z.object({ id: z.string().min(1) });

const StreamQuery = z.object({
  since: z.coerce.number().int().min(-1).default(-1),
});

function sessionView(session: ResearchOrchestrator) {
  return {
    sessionId: session.sessionId,
    status: session.status,
    error: session.error,
    snapshot: session.snapshot(),
    plan: session.state.plan,
    notFound: session.state.notFound,
  };
}

// Research session routes. Sessions run in the background; clients poll
// GET /:id or follow the WebSocket stream for progress.
const routes: FastifyPluginAsync = async (app) => {
  const engine = app.research;

  app.get("/", async (_req, rep) => {
    const sessions = await engine.listCheckpoints();
    return rep.send({ sessions });
  });

  app.post("/", async (req, rep) => {
    const body = CreateResearchBody.parse(req.body);
    const session = await engine.createSession(body);
    engine.start(session.sessionId);
    req.log.info({ sessionId: session.sessionId }, "research session started");
    return rep.status(202).send(sessionView(session));
  });

  app.get("/:id", async (req, rep) => {
    const { id } = SessionParams.parse(req.params);
    const session = await engine.findSession(id);
    return rep.send(sessionView(session));
  });

  app.get("/:id/report", async (req, rep) => {
    const { id } = SessionParams.parse(req.params);
    const session = await engine.findSession(id);
    const report = session.state.report;
    if (!report) {
      return rep.status(409).send({
        error: {
          code: "report_not_ready",
          message: `Session ${id} is in phase ${session.state.phase}; no report yet`,
        },
      });
    }
    return rep.send({ sessionId: id, report });
  });

  app.post("/:id/approve", async (req, rep) => {
    const { id } = SessionParams.parse(req.params);
    const session = await engine.approve(id);
    return rep.status(202).send(sessionView(session));
  });

  app.post("/:id/stop", async (req, rep) => {
    const { id } = SessionParams.parse(req.params);
    const session = await engine.stop(id);
    return rep.status(202).send(sessionView(session));
  });

  app.post("/:id/resume", async (req, rep) => {
    const { id } = SessionParams.parse(req.params);
    const session = await engine.resume(id);
    return rep.status(202).send(sessionView(session));
  });

  app.get("/:id/stream", { websocket: true }, async (socket, req) => {
    const params = SessionParams.safeParse(req.params);
    const query = StreamQuery.safeParse(req.query);
    if (!params.success || !query.success) {
      socket.send(JSON.stringify({ type: "error", code: "validation_error", message: "Invalid stream request" }));
      socket.close();
      return;
    }

    let session: ResearchOrchestrator;
    try {
      session = await engine.findSession(params.data.id);
    } catch (error) {
      socket.send(
        JSON.stringify({
          type: "error",
          code: "session_not_found",
          message: error instanceof Error ? error.message : String(error),
        })
      );
      socket.close();
      return;
    }

    const send = (event: SequencedEvent) => {
      if (socket.readyState !== socket.OPEN) return;
      socket.send(JSON.stringify(event));
      if (event.type === "progress" && event.snapshot.phase === "done") {
        socket.close();
      }
    };

    // A session reattached from its checkpoint has no buffered events
    if (engine.progress.lastSeq(session.sessionId) < 0) {
      const current = engine.progress.publish(session.sessionId, {
        type: "progress",
        snapshot: session.snapshot(),
      });
      // Its seq restarted at 0, so a client's `since` cannot be trusted against it
      if (session.state.phase === "done") {
        send(current);
        return;
      }
    }

    const unsubscribe = engine.progress.subscribe(session.sessionId, query.data.since, send);
    socket.on("close", () => {
      unsubscribe();
      req.log.info({ sessionId: session.sessionId }, "progress stream closed");
    });
  });
};

export default routes;
