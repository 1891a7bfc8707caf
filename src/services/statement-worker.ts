// ============================================================================
// Cash Logistics MCP Server — Executor Worker Entry
// ============================================================================
//
// Runs on a worker thread so the executor can terminate a statement that
// outlives its deadline. Every reply is posted first, then signalled, because
// the executor sleeps on the signal instead of running an event loop.

import { workerData } from "worker_threads";
import { log } from "../logger.js";
import { WorkerRequestSchema, WorkerInitSchema, type WorkerReply } from "./statement-protocol.js";
import { StatementRunner } from "./statement-runner.js";

const init = WorkerInitSchema.parse(workerData);
log.setLevel(init.logLevel);

function reply(message: WorkerReply): void {
    init.port.postMessage(message);
    Atomics.store(init.signal, 0, 1);
    Atomics.notify(init.signal, 0);
}

function start(): void {
    let runner: StatementRunner;
    try {
        runner = StatementRunner.open(init);
    } catch (err) {
        reply({ type: "failed", message: err instanceof Error ? err.message : String(err) });
        init.port.close();
        return;
    }

    init.port.on("message", (raw: unknown) => {
        const request = WorkerRequestSchema.safeParse(raw);
        if (!request.success) {
            reply({ type: "done", outcome: { ok: false, failure: { type: "engine", message: "Malformed executor request" } } });
            return;
        }
        if (request.data.type === "close") {
            runner.close();
            reply({ type: "closed" });
            init.port.close();
            return;
        }
        const { sql, mode, params } = request.data;
        reply({ type: "done", outcome: runner.run(sql, mode, params) });
    });

    log.child("executor:worker").debug("Ready", { dbPath: init.dbPath });
    reply({ type: "ready" });
}

start();
