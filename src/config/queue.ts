import { Queue, Worker, type Job, type WorkerOptions } from "bullmq";
import { Redis } from "ioredis";
import { createChildLogger } from "./logger.js";

const log = createChildLogger("queue");

let connection: Redis | null = null;

export function getRedisConnection(): Redis {
  if (!connection) {
    connection = new Redis(process.env.REDIS_URL ?? "redis://localhost:6379", {
      maxRetriesPerRequest: null,
    });
    connection.on("error", (err) => log.error({ err }, "Redis connection error"));
  }
  return connection;
}

export function createQueue<T>(name: string): Queue<T> {
  return new Queue<T>(name, {
    connection: getRedisConnection(),
    defaultJobOptions: {
      attempts: 3,
      backoff: { type: "exponential", delay: 2000 },
      removeOnComplete: { age: 86400 }, // 24h
      removeOnFail: { age: 604800 }, // 7d
    },
  });
}

export function createWorker<T>(
  queueName: string,
  processor: (job: Job<T>) => Promise<void>,
  opts?: Partial<WorkerOptions>
): Worker<T> {
  const worker = new Worker<T>(queueName, processor, {
    connection: getRedisConnection(),
    // Automation sweeps are not safe to interleave with each other
    concurrency: 1,
    ...opts,
  });

  worker.on("completed", (job) => {
    log.info({ jobId: job.id, queue: queueName }, "Job completed");
  });

  worker.on("failed", (job, err) => {
    log.error(
      { jobId: job?.id, queue: queueName, err },
      "Job failed"
    );
  });

  return worker;
}

export async function checkRedisHealth(): Promise<boolean> {
  try {
    const redis = getRedisConnection();
    const res = await redis.ping();
    return res === "PONG";
  } catch (err) {
    log.warn({ err }, "Redis health check failed");
    return false;
  }
}

export async function closeRedis(): Promise<void> {
  if (connection) {
    await connection.quit();
    connection = null;
    log.info("Redis connection closed");
  }
}
