import os from "node:os";
import type { SqliteDb } from "../db/db.js";
import { claimNextScan, listProjects, markScanFailed, nowMs, releaseExpiredLeases, renewScanLease } from "../db/repo.js";
import type { Scan } from "../db/types.js";
import { errorMessage } from "../lib/errors.js";
import type { Notifier } from "../lib/notifier.js";
import { executeScan } from "../lib/scanPipeline.js";
import { pipelineDeps, type AppServices } from "../services.js";

const DIGEST_CHECK_INTERVAL_MS = 60 * 1000;

export type WorkerHandle = {
  stop: () => Promise<void>;
};

export function startWorkerLoop(args: { services: AppServices; worker_id?: string }): WorkerHandle {
  const { services } = args;
  const { config, db } = services;
  const workerId = args.worker_id || `${os.hostname()}:${process.pid}`;
  const pollMs = config.WORKER_POLL_MS;
  const leaseMs = config.WORKER_LEASE_MS;
  const concurrency = Math.max(1, config.WORKER_CONCURRENCY);
  const inFlight = new Set<Promise<void>>();
  let stopped = false;
  let nextDigestCheckAt = nowMs();

  const loop = async () => {
    while (!stopped) {
      const now = nowMs();
      const released = releaseExpiredLeases(db, now);
      if (released > 0) {
        console.warn(`Worker released expired leases count=${released}`);
      }
      if (now >= nextDigestCheckAt) {
        await sendWeeklyDigests(db, services.notifier, now);
        nextDigestCheckAt = now + DIGEST_CHECK_INTERVAL_MS;
      }

      let claimedCount = 0;
      while (inFlight.size < concurrency && !stopped) {
        const claimed = claimNextScan(db, {
          worker_id: workerId,
          now_ms: nowMs(),
          lease_ms: leaseMs
        });
        if (!claimed) break;
        console.log(`Worker claimed scan_id=${claimed.scan_id} project_id=${claimed.project_id} attempt=${claimed.attempt_count}`);
        claimedCount += 1;
        const task: Promise<void> = processClaimedScan(services, claimed, { worker_id: workerId, lease_ms: leaseMs }).finally(() => {
          inFlight.delete(task);
        });
        inFlight.add(task);
      }

      if (claimedCount === 0) {
        await sleep(pollMs);
      }
    }
  };

  const done = loop().catch((e: unknown) => {
    console.error(`Worker loop crashed: ${errorMessage(e)}`);
    stopped = true;
  });

  return {
    stop: async () => {
      stopped = true;
      await done;
      await Promise.all([...inFlight]);
    }
  };
}

async function processClaimedScan(services: AppServices, scan: Scan, lease: { worker_id: string; lease_ms: number }): Promise<void> {
  const heartbeat = setInterval(() => {
    try {
      const held = renewScanLease(services.db, { scan_id: scan.scan_id, worker_id: lease.worker_id, now_ms: nowMs(), lease_ms: lease.lease_ms });
      if (!held) console.warn(`Worker lost lease scan_id=${scan.scan_id} worker_id=${lease.worker_id}`);
    } catch (e) {
      console.warn(`Worker could not renew lease scan_id=${scan.scan_id}: ${errorMessage(e)}`);
    }
  }, leaseRenewalInterval(lease.lease_ms));
  heartbeat.unref();

  try {
    const out = await executeScan(pipelineDeps(services), scan.scan_id);
    console.log(`Worker finished scan_id=${scan.scan_id} status=${out.scan.status}`);
  } catch (e) {
    const message = errorMessage(e);
    console.warn(`Worker failed scan_id=${scan.scan_id}: ${message}`);
    try {
      markScanFailed(services.db, scan.scan_id, message, { now_ms: nowMs() });
    } catch (inner) {
      console.error(`Worker could not mark scan_id=${scan.scan_id} failed: ${errorMessage(inner)}`);
    }
  } finally {
    clearInterval(heartbeat);
  }
}

function leaseRenewalInterval(lease_ms: number): number {
  return Math.max(10, Math.floor(lease_ms / 3));
}

export async function sendWeeklyDigests(db: SqliteDb, notifier: Notifier, now_ms: number): Promise<number> {
  let sent = 0;
  for (const project of listProjects(db, { limit: 10_000, offset: 0 })) {
    try {
      const entry = await notifier.sendWeeklyIfDue({ project, now_ms });
      if (entry) sent += 1;
    } catch (e) {
      console.warn(`Weekly digest failed project_id=${project.project_id}: ${errorMessage(e)}`);
    }
  }
  return sent;
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
