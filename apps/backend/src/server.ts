import { createApp } from "./app";
import { loadConfig } from "./config";
import { ComparisonPipeline } from "./services/comparisonPipeline";
import { JobManager } from "./services/jobManager";
import { InMemoryJobStore } from "./services/jobStore";
import { ParserProfile } from "./services/parserProfile";
import { RecordParser } from "./services/recordParser";
import { ReportWriter } from "./services/reportWriter";

const config = loadConfig();
const profile = ParserProfile.load(config.parserProfilePath);

const pipeline = new ComparisonPipeline({
  parser: new RecordParser(profile),
  writer: new ReportWriter({ shiftOrder: profile.shiftOrder, roleOrder: profile.roleOrder }),
  profile,
  variance: { censusFallback: config.censusFallback, targetBand: config.targetBand, splitBand: config.splitBand },
});

const manager = new JobManager({
  store: new InMemoryJobStore(),
  runner: pipeline,
  workDir: config.workDir,
  maxConcurrentJobs: config.maxConcurrentJobs,
  retentionMs: config.retentionMs,
});
manager.start();

const server = createApp(manager, config).listen(config.port, () => {
  console.log(`[Server] HPPD variance service running on port ${config.port}`);
  console.log(`[Server] Work dir: ${config.workDir}, ${config.maxConcurrentJobs} concurrent job(s)`);
});

const shutdown = (signal: string) => {
  console.log(`[Server] ${signal} received, shutting down`);
  manager.stop();
  server.close(() => process.exit(0));
};
process.on("SIGTERM", () => shutdown("SIGTERM"));
process.on("SIGINT", () => shutdown("SIGINT"));
