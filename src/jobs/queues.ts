import { Queue } from 'bullmq';
import { env } from '../config/env.js';
import { logger } from '../utils/logger.js';

export const QUEUE_NAMES = ['feed-events'] as const;

export type QueueName = (typeof QUEUE_NAMES)[number];

const connection = { url: env.REDIS_URL };

// Created on first use so importing this module opens no connections.
const queues = new Map<QueueName, Queue>();

function getQueue(name: QueueName): Queue {
  let queue = queues.get(name);
  if (!queue) {
    queue = new Queue(name, { connection });
    queues.set(name, queue);
  }
  return queue;
}

interface JobData {
  [key: string]: unknown;
}

export async function addJob(
  queueName: QueueName,
  jobName: string,
  data: JobData,
  opts?: { delay?: number; priority?: number },
) {
  const job = await getQueue(queueName).add(jobName, data, {
    attempts: 3,
    backoff: { type: 'exponential', delay: 1000 },
    removeOnComplete: 100,
    removeOnFail: 1000,
    ...opts,
  });

  logger.debug({ jobId: job.id, queue: queueName, jobName }, 'Job added');
  return job;
}

export async function closeQueues() {
  await Promise.all([...queues.values()].map((q) => q.close()));
  queues.clear();
}
