import express from "express";
import cors from "cors";
import { createServer, type Server as HttpServer } from "http";
import { Server } from "socket.io";
import { z } from "zod";
import type { CoachConfig, ServerConfig } from "./config";
import { CoachingSession } from "./core/CoachingSession";
import { errorHandler } from "./middleware/error/errorHandler";
import { parsePreCallBrief } from "./services/brief/PreCallBrief";
import type { Subscription } from "./services/delivery/DeliverySink";
import type { GenerationService } from "./services/generation/GenerationService";
import { LoggingService, LogLevel } from "./services/logging/LoggingService";
import { speakerSchema } from "./types/schemas";
import { CoachError, ErrorCodes, ErrorSeverity, describeError } from "./utils/error";
import type { AckFailure, ClientToServerEvents, ServerToClientEvents } from "./types/socket";
import type { PreCallBrief } from "./types";

const startCallSchema = z
  .object({
    brief: z.unknown().optional(),
    speakerMap: z.record(z.string(), speakerSchema).optional(),
  })
  .default({});

const acknowledgeSchema = z.object({ suggestionId: z.string().min(1) });

export interface CoachServerOptions {
  coach: CoachConfig;
  server: ServerConfig;
  brief: PreCallBrief | null;
  generation: GenerationService | null;
}

export interface CoachServer {
  app: express.Express;
  httpServer: HttpServer;
  io: Server<ClientToServerEvents, ServerToClientEvents>;
  currentSession(): CoachingSession | null;
}

function failure(error: unknown): AckFailure {
  return error instanceof CoachError
    ? { success: false, error: error.message, code: error.code }
    : { success: false, error: describeError(error) };
}

/**
 * HTTP + socket.io boundary. The transcription client pushes raw segments in,
 * every connected display receives suggestions, MEDDIC and stage updates out.
 * One call is active at a time.
 */
export function createCoachServer(options: CoachServerOptions): CoachServer {
  const logger = LoggingService.getInstance();
  let session: CoachingSession | null = null;

  const app = express();
  app.use(
    cors({
      origin: options.server.frontendUrl,
      credentials: true,
    })
  );
  app.use(express.json());

  app.get("/health", (_req, res) => {
    res.json({ status: "healthy" });
  });

  app.get("/api/status", (_req, res) => {
    res.json({
      callActive: session?.active ?? false,
      callId: session?.callId ?? null,
      generationAvailable: options.generation !== null,
      subscribers: session?.sink.subscriberCount ?? 0,
    });
  });

  app.get("/api/call", (_req, res, next) => {
    if (!session) {
      next(
        new CoachError("No call has been started", ErrorCodes.CALL_NOT_ACTIVE, ErrorSeverity.LOW, {
          component: "server.getCall",
        })
      );
      return;
    }
    res.json({
      summary: session.summary(),
      suggestions: session.aggregator.liveWindow(),
    });
  });

  app.use(errorHandler);

  const httpServer = createServer(app);
  const io = new Server<ClientToServerEvents, ServerToClientEvents>(httpServer, {
    cors: {
      origin: options.server.frontendUrl,
      methods: ["GET", "POST"],
      credentials: true,
    },
  });

  async function forward(subscription: Subscription): Promise<void> {
    for await (const event of subscription) {
      switch (event.type) {
        case "suggestion":
          io.emit("suggestion", event.update);
          break;
        case "meddic":
          io.emit("meddicUpdate", event.progress);
          break;
        case "stage":
          io.emit("stageChange", event.stage);
          break;
        case "operational":
          io.emit("operational", event.signal);
          break;
      }
    }
  }

  function startCall(payload: unknown): CoachingSession {
    const request = startCallSchema.parse(payload ?? undefined);
    const brief =
      request.brief !== undefined ? parsePreCallBrief(request.brief) : options.brief;

    if (session?.active) {
      io.emit("callEnded", session.end());
    }

    const next = new CoachingSession({
      config: options.coach,
      brief: brief ?? undefined,
      generation: options.generation,
      speakerMap: request.speakerMap,
    });
    session = next;

    forward(next.subscribe()).catch((error: unknown) => {
      logger.log(LogLevel.ERROR, "Delivery forwarding stopped", "server", {
        callId: next.callId,
        originalError: describeError(error),
      });
    });

    io.emit("callStarted", {
      callId: next.callId,
      degraded: next.degraded,
      meddic: next.state.meddicProgress(),
      stage: next.state.stage,
    });
    return next;
  }

  function activeSession(component: string): CoachingSession {
    if (!session?.active) {
      throw new CoachError("No active call", ErrorCodes.CALL_NOT_ACTIVE, ErrorSeverity.LOW, {
        component,
      });
    }
    return session;
  }

  io.on("connection", (socket) => {
    logger.log(LogLevel.INFO, "Client connected", "server", { socketId: socket.id });

    socket.on("disconnect", () => {
      logger.log(LogLevel.INFO, "Client disconnected", "server", { socketId: socket.id });
    });

    socket.on("startCall", (payload, callback) => {
      try {
        const started = startCall(payload);
        callback?.({ success: true, callId: started.callId });
      } catch (error) {
        logger.log(LogLevel.WARN, "Failed to start call", "server", {
          originalError: describeError(error),
        });
        callback?.(failure(error));
      }
    });

    socket.on("transcript", (payload, callback) => {
      try {
        const segment = activeSession("server.transcript").ingest(payload);
        callback?.({
          success: true,
          accepted: segment !== null,
          segmentId: segment?.segmentId ?? null,
        });
      } catch (error) {
        callback?.(failure(error));
      }
    });

    socket.on("acknowledge", (payload, callback) => {
      try {
        const { suggestionId } = acknowledgeSchema.parse(payload);
        const acknowledged = activeSession("server.acknowledge").acknowledge(suggestionId);
        callback?.({ success: true, acknowledged });
      } catch (error) {
        callback?.(failure(error));
      }
    });

    socket.on("endCall", (callback) => {
      try {
        const summary = activeSession("server.endCall").end();
        io.emit("callEnded", summary);
        callback?.({ success: true, summary });
      } catch (error) {
        callback?.(failure(error));
      }
    });
  });

  return {
    app,
    httpServer,
    io,
    currentSession: () => session,
  };
}
