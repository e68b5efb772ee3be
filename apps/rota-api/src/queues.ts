// BullMQ queue for maintenance jobs, on Redis from REDIS_URL.
import { Queue } from "bullmq";
import { Redis } from "ioredis";
import { QUEUE_MAINTENANCE, type MaintenanceJob } from "@rota/shared";

export function createMaintenanceQueue(redisUrl: string) {
  const connection = new Redis(redisUrl, {
    maxRetriesPerRequest: null,
    enableReadyCheck: false,
  });
  const queue = new Queue<MaintenanceJob>(QUEUE_MAINTENANCE, { connection });
  return { queue, connection };
}
