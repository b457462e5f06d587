import { config } from "dotenv";
import { loadConfig } from "./config";
import { createCoachServer } from "./server";
import { loadPreCallBrief } from "./services/brief/PreCallBrief";
import {
  OpenAIGenerationService,
  type GenerationService,
} from "./services/generation/GenerationService";
import { LoggingService, LogLevel } from "./services/logging/LoggingService";

// Load environment variables
config();

const logger = LoggingService.getInstance();
const { coach, server } = loadConfig();

const brief = server.briefPath ? await loadPreCallBrief(server.briefPath) : null;

let generation: GenerationService | null = null;
if (server.openaiApiKey) {
  generation = new OpenAIGenerationService({
    apiKey: server.openaiApiKey,
    models: { 2: coach.tier2.model, 3: coach.tier3.model },
  });
} else {
  logger.log(
    LogLevel.WARN,
    "OPENAI_API_KEY not set, running on pattern matching only",
    "index"
  );
}

const { httpServer } = createCoachServer({ coach, server, brief, generation });

httpServer.listen(server.port, () => {
  logger.log(LogLevel.INFO, `Server running on port ${server.port}`, "index", {
    brief: server.briefPath,
    tier2Model: coach.tier2.model,
    tier3Model: coach.tier3.model,
  });
});
