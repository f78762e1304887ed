import {
  DeleteMessageCommand,
  ReceiveMessageCommand,
  SendMessageCommand,
  type SQSClient,
} from "@aws-sdk/client-sqs";
import { z } from "zod";

export const documentJobSchema = z.object({
  documentId: z.string().min(1),
  fundId: z.string().min(1),
});

export type DocumentJob = z.infer<typeof documentJobSchema>;

export type ReceivedMessage = {
  receipt: string;
  body: string;
};

export type JobQueue = {
  send(job: DocumentJob): Promise<void>;
  receive(maxMessages: number, waitSeconds: number): Promise<ReceivedMessage[]>;
  ack(receipt: string): Promise<void>;
};

/** Parses a queue message body; null when it is not a document job. */
export function parseDocumentJob(body: string): DocumentJob | null {
  try {
    const parsed = documentJobSchema.safeParse(JSON.parse(body));
    return parsed.success ? parsed.data : null;
  } catch {
    return null;
  }
}

export function createSqsJobQueue(sqs: SQSClient, queueUrl: string): JobQueue {
  return {
    async send(job) {
      await sqs.send(new SendMessageCommand({ QueueUrl: queueUrl, MessageBody: JSON.stringify(job) }));
    },
    async receive(maxMessages, waitSeconds) {
      const res = await sqs.send(
        new ReceiveMessageCommand({
          QueueUrl: queueUrl,
          MaxNumberOfMessages: Math.min(Math.max(maxMessages, 1), 10),
          WaitTimeSeconds: waitSeconds,
        }),
      );
      const out: ReceivedMessage[] = [];
      for (const m of res.Messages ?? []) {
        if (m.ReceiptHandle) out.push({ receipt: m.ReceiptHandle, body: m.Body ?? "" });
      }
      return out;
    },
    async ack(receipt) {
      await sqs.send(new DeleteMessageCommand({ QueueUrl: queueUrl, ReceiptHandle: receipt }));
    },
  };
}

/** In-process queue. Received messages stay in flight until acknowledged. */
export function createMemoryJobQueue(): JobQueue & { sendRaw(body: string): void; depth(): number; inFlight(): number } {
  const visible: ReceivedMessage[] = [];
  const inFlight = new Map<string, ReceivedMessage>();
  let seq = 0;

  const enqueue = (body: string) => {
    seq += 1;
    visible.push({ receipt: `r-${seq}`, body });
  };

  return {
    async send(job) {
      enqueue(JSON.stringify(job));
    },
    sendRaw(body) {
      enqueue(body);
    },
    async receive(maxMessages) {
      const batch = visible.splice(0, Math.max(maxMessages, 0));
      for (const m of batch) inFlight.set(m.receipt, m);
      return batch;
    },
    async ack(receipt) {
      inFlight.delete(receipt);
    },
    depth() {
      return visible.length;
    },
    inFlight() {
      return inFlight.size;
    },
  };
}
