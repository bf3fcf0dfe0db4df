import { readFile } from "node:fs/promises";
import dotenv from "dotenv";
import pino from "pino";
import { loadRefundFeatureConfig, validateRefundFeatureConfig } from "../src/config/refundFeature";
import { formatZodError, processTicketBodySchema } from "../src/lib/ticket/validate";
import { createRefundServices } from "../src/services/refundServices";

dotenv.config({ path: ".env" });
dotenv.config({ path: ".env.local", override: true });

const logger = pino({ level: process.env.LOG_LEVEL || "info" });

const run = async () => {
  const file = process.argv[2];
  if (!file) {
    console.error("Usage: npm run decide -- <ticket.json>");
    process.exit(1);
  }

  const parsed = processTicketBodySchema.safeParse(JSON.parse(await readFile(file, "utf8")));
  if (!parsed.success) {
    logger.error(formatZodError(parsed.error), "Ticket file invalid");
    process.exit(1);
  }

  const { config, issues } = validateRefundFeatureConfig(loadRefundFeatureConfig(process.env));
  if (issues.length > 0) {
    logger.warn({ issues }, "Refund pipeline configuration issues detected");
  }

  const { pipeline } = createRefundServices(config, logger);
  const { ticket, notes, timeout_ms } = parsed.data;
  const result = await pipeline.processTicket(ticket, notes, { timeoutMs: timeout_ms });
  console.log(JSON.stringify(result, null, 2));
};

run().catch((err: unknown) => {
  logger.error({ err }, "Ticket decision failed");
  process.exit(1);
});
