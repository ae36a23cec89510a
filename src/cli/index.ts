#!/usr/bin/env -S tsx
import { createFaqAgent } from "../agent/FaqAgent";
import { loadAppConfig } from "../config/appConfig";
import { loadDotenv } from "../env/detector";
import logger from "../logger";
import { createRagServices } from "../rag";
import { describeError } from "../rag/errors";
import type { IngestionSummary } from "../rag/types/rag.types";
import { CliUsageError, parseCliArgs, USAGE } from "./args";

loadDotenv();

const summaryView = (summary: IngestionSummary) => ({
  ...summary,
  documents: summary.documents.map(({ recordIds: _recordIds, ...document }) => document),
});

async function main() {
  const command = parseCliArgs(process.argv.slice(2));
  if (command.command === "help") {
    console.log(USAGE);
    return;
  }

  const config = loadAppConfig();
  const { ingestion, retrieval } = createRagServices(config);

  switch (command.command) {
    case "ingest": {
      const summary = await ingestion.ingest(command.pattern, {
        maxChunkTokens: command.maxTokens,
        overlapTokens: command.overlap,
        pruneStale: command.prune,
      });
      console.log(JSON.stringify(summaryView(summary), null, 2));
      if (summary.documentsFound > 0 && summary.documentsProcessed === 0) process.exitCode = 1;
      break;
    }
    case "search": {
      const results = await retrieval.search(command.query, command.topK ?? retrieval.defaultTopK);
      console.log(JSON.stringify(results, null, 2));
      break;
    }
    case "remove": {
      const removed = await ingestion.removeDocument(command.filename);
      console.log(`Removed ${removed} records for ${command.filename}`);
      break;
    }
    case "agent": {
      const reply = await createFaqAgent(config.agent, retrieval).ask(command.message);
      console.log(reply.answer);
      break;
    }
  }
}

main().catch((error: unknown) => {
  if (error instanceof CliUsageError) {
    console.error(error.message);
    console.error(USAGE);
    process.exit(2);
  }
  logger.error("CLI command failed", { error });
  console.error(`Error: ${describeError(error)}`);
  process.exit(1);
});
