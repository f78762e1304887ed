import { loadConfig } from "@/lib/config";
import { errorMessage } from "@/lib/errors";
import { createRuntime } from "@/lib/runtime";
import { assertStandaloneWorkerStorage } from "@/lib/worker";

/** Polls SQS for document jobs until SIGINT/SIGTERM. Needs the DynamoDB storage driver. */
async function main() {
  const config = loadConfig();
  assertStandaloneWorkerStorage(config.STORAGE_DRIVER);
  const rt = createRuntime(config);
  rt.worker.start();
  console.log("document worker started", {
    storageDriver: config.STORAGE_DRIVER,
    concurrency: config.WORKER_CONCURRENCY,
  });

  let stopping = false;
  const shutdown = async (signal: string) => {
    if (stopping) return;
    stopping = true;
    console.log("document worker stopping", { signal, inFlight: rt.worker.inFlightCount() });
    await rt.worker.stop();
    process.exit(0);
  };
  for (const signal of ["SIGINT", "SIGTERM"] as const) {
    process.on(signal, () => {
      shutdown(signal).catch((err: unknown) => {
        console.error("document worker shutdown failed", { err: errorMessage(err) });
        process.exit(1);
      });
    });
  }
}

main().catch((err: unknown) => {
  console.error("document worker crashed", { err: errorMessage(err) });
  process.exit(1);
});
