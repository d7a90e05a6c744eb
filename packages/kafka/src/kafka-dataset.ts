/**
 * Broker-backed dataset over a Kafka topic.
 *
 * One topic per dataset. `Node.setup` initializes input handles as consumers
 * and output handles as producers; admin operations (create, delete, exists,
 * describe) open a short-lived admin client per call.
 *
 * Every value written is wrapped in an envelope:
 *
 * ```json
 * { "timestamp": "...", "dataset": "numbers", "sourcePipeline": "integers",
 *   "sourceNode": "sequencer", "message": 42 }
 * ```
 */

import { z } from "zod";
import { Kafka, logLevel } from "kafkajs";
import type {
  Admin,
  Consumer,
  EachMessagePayload,
  Producer,
  logCreator,
} from "kafkajs";
import {
  AbstractAsyncDataset,
  ConfigurationError,
  DatasetCreateStatus,
  PendingOperation,
  createLogger,
  toDatasetError,
} from "@tributary/core";
import type {
  ConnectionParams,
  DatasetOptions,
  DatasetParams,
} from "@tributary/core";

const log = createLogger("kafka");

// ---------- Schemas ----------

const KafkaParamsSchema = z.object({
  numPartitions: z.number().int().positive().default(1),
  replicationFactor: z.number().int().positive().default(1),
  /** Topic-level configuration entries, e.g. `{ "retention.ms": "60000" }`. */
  topicConfig: z.record(z.string()).default({}),
  clientId: z.string().min(1).default("tributary"),
  /** Received messages held before the consumer pauses fetching. */
  maxBuffered: z.number().int().positive().default(1000),
});

const TopicOptionsSchema = z.object({
  pipelineName: z.string().min(1).optional(),
  prefix: z.string().optional(),
  hasPipelinePrefix: z.boolean().default(false),
});

const ConsumerConfigSchema = z.object({
  groupId: z.string().min(1).optional(),
  sessionTimeout: z.number().int().positive().optional(),
  fromBeginning: z.boolean().default(false),
});

const ProducerConfigSchema = z.object({
  allowAutoTopicCreation: z.boolean().optional(),
  idempotent: z.boolean().optional(),
});

const ConnectionFields = {
  datasetName: z.string(),
  nodeName: z.string(),
  pipelineName: z.string(),
  prefix: z.string().optional(),
  hasPipelinePrefix: z.boolean(),
};

const InitializeOptionsSchema = z.object({
  connectionParams: z.discriminatedUnion("role", [
    z.object({
      role: z.literal("consumer"),
      ...ConnectionFields,
      consumerConfig: z.record(z.unknown()),
    }),
    z.object({
      role: z.literal("producer"),
      ...ConnectionFields,
      producerConfig: z.record(z.unknown()),
    }),
  ]),
});

const ReadOptionsSchema = z.object({
  how: z.enum(["next", "last"]).default("next"),
  block: z.boolean().default(false),
  /** Upper bound for a blocking read; waits indefinitely when unset. */
  timeoutMs: z.number().nonnegative().optional(),
});

export const KafkaEnvelopeSchema = z.object({
  timestamp: z.string(),
  dataset: z.string(),
  sourcePipeline: z.string(),
  sourceNode: z.string(),
  message: z.unknown(),
});

export type KafkaParams = z.input<typeof KafkaParamsSchema>;
export type KafkaEnvelope = z.infer<typeof KafkaEnvelopeSchema>;

export interface TopicNameOptions {
  pipelineName?: string;
  prefix?: string;
  hasPipelinePrefix?: boolean;
}

/**
 * Topic of a dataset: `[<prefix>.][<pipelineName>.]<datasetName>`. The
 * pipeline segment is omitted when the dataset name already carries it.
 */
export function topicName(
  datasetName: string,
  options: TopicNameOptions = {},
): string {
  let topic = datasetName;
  if (!options.hasPipelinePrefix) {
    if (!options.pipelineName) {
      throw new ConfigurationError(
        `Cannot derive the topic of dataset "${datasetName}" without a pipeline name`,
      );
    }
    topic = `${options.pipelineName}.${datasetName}`;
  }
  return options.prefix ? `${options.prefix}.${topic}` : topic;
}

/** Routes kafkajs' internal logging through the framework logger. */
const kafkaLogCreator: logCreator = () => ({ namespace, level, log: entry }) => {
  const { message, timestamp: _timestamp, ...extra } = entry;
  const fields = { namespace, ...extra };
  switch (level) {
    case logLevel.ERROR:
      log.error(fields, message);
      break;
    case logLevel.WARN:
      log.warn(fields, message);
      break;
    case logLevel.INFO:
      log.info(fields, message);
      break;
    default:
      log.debug(fields, message);
  }
};

// ---------- KafkaDataset ----------

export class KafkaDataset extends AbstractAsyncDataset {
  readonly kind = "broker";
  readonly brokers: string[];
  private readonly config: z.infer<typeof KafkaParamsSchema>;
  private readonly kafka: Kafka;

  private topic: string | undefined;
  private consumer: Consumer | undefined;
  private producer: Producer | undefined;
  private source: { pipeline: string; node: string } | undefined;
  private buffer: KafkaEnvelope[] = [];
  private pausedTopic: string | undefined;
  private waiters: Array<() => void> = [];

  /**
   * @param target comma-separated broker list; `defaultBrokers` when empty
   * @throws ConfigurationError for invalid params
   */
  constructor(
    name: string,
    target: string = "",
    params: DatasetParams = {},
    defaultBrokers: readonly string[] = ["localhost:9092"],
  ) {
    super(name, target, params);
    const parsed = KafkaParamsSchema.safeParse(params);
    if (!parsed.success) {
      throw new ConfigurationError(
        `Invalid params for Kafka dataset "${name}": ${parsed.error.issues
          .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
          .join("; ")}`,
        { cause: parsed.error },
      );
    }
    this.config = parsed.data;

    const fromTarget = target
      .split(",")
      .map((broker) => broker.trim())
      .filter((broker) => broker.length > 0);
    this.brokers = fromTarget.length > 0 ? fromTarget : [...defaultBrokers];
    this.kafka = new Kafka({
      clientId: this.config.clientId,
      brokers: this.brokers,
      logCreator: kafkaLogCreator,
    });
  }

  /** Topic resolved by the last `create` or `initialize`, if any. */
  get currentTopic(): string | undefined {
    return this.topic;
  }

  /** Number of received messages not yet read. */
  get buffered(): number {
    return this.buffer.length;
  }

  /**
   * Read until a message equal to `endMessage` arrives or a blocking read
   * times out. Returns the envelopes before the end message.
   */
  async consumeAll(
    endMessage: unknown,
    options: { timeoutMs?: number } = {},
  ): Promise<KafkaEnvelope[]> {
    try {
      const messages: KafkaEnvelope[] = [];
      for (;;) {
        const envelope = await this.doRead({
          how: "next",
          block: true,
          timeoutMs: options.timeoutMs ?? 5000,
        });
        if (envelope === undefined || envelope.message === endMessage) {
          return messages;
        }
        messages.push(envelope);
      }
    } catch (error) {
      throw toDatasetError(
        error,
        this.name,
        `Failed to consume dataset ${this.name}.`,
      );
    }
  }

  // ---------- Operations ----------

  protected async doRead(
    options: DatasetOptions,
  ): Promise<KafkaEnvelope | undefined> {
    if (!this.consumer) {
      throw new Error(
        `Dataset ${this.name} is not initialized as a consumer`,
      );
    }
    const { how, block, timeoutMs } = ReadOptionsSchema.parse(options);

    if (this.buffer.length === 0 && block) {
      await this.waitForMessage(timeoutMs);
    }
    let envelope: KafkaEnvelope | undefined;
    if (how === "last") {
      envelope = this.buffer[this.buffer.length - 1];
      this.buffer = [];
    } else {
      envelope = this.buffer.shift();
    }
    this.resumeIfDrained();
    return envelope;
  }

  protected async doWrite(value: unknown): Promise<void> {
    if (!this.producer || !this.topic || !this.source) {
      throw new Error(
        `Dataset ${this.name} is not initialized as a producer`,
      );
    }
    const envelope: KafkaEnvelope = {
      timestamp: new Date().toISOString(),
      dataset: this.name,
      sourcePipeline: this.source.pipeline,
      sourceNode: this.source.node,
      message: value,
    };
    await this.producer.send({
      topic: this.topic,
      messages: [{ value: JSON.stringify(envelope) }],
    });
  }

  protected async doCreate(
    options: DatasetOptions,
  ): Promise<DatasetCreateStatus> {
    const topic = this.resolveTopic(options);
    const { numPartitions, replicationFactor, topicConfig } = this.config;
    const creation = this.withAdmin((admin) =>
      admin.createTopics({
        topics: [
          {
            topic,
            numPartitions,
            replicationFactor,
            configEntries: Object.entries(topicConfig).map(([name, value]) => ({
              name,
              value,
            })),
          },
        ],
        waitForLeaders: true,
      }),
    );
    log.debug({ dataset: this.name, topic }, "Creating topic");
    return new DatasetCreateStatus(this.name, {
      topicFutures: { [topic]: new PendingOperation(creation) },
    });
  }

  protected async doDelete(): Promise<void> {
    const topic = this.resolveTopic({});
    await this.withAdmin((admin) => admin.deleteTopics({ topics: [topic] }));
    log.debug({ dataset: this.name, topic }, "Deleted topic");
  }

  protected async doInitialize(options: DatasetOptions): Promise<void> {
    const parsed = InitializeOptionsSchema.safeParse(options);
    if (!parsed.success) {
      throw new ConfigurationError(
        `Kafka dataset "${this.name}" requires connection parameters to initialize`,
        { cause: parsed.error },
      );
    }
    const params: ConnectionParams = parsed.data.connectionParams;
    this.topic = topicName(this.name, params);
    this.source = { pipeline: params.pipelineName, node: params.nodeName };

    if (params.role === "consumer") {
      await this.connectConsumer(params.consumerConfig, params);
    } else {
      await this.connectProducer(params.producerConfig);
    }
  }

  protected async doExists(options: DatasetOptions): Promise<boolean> {
    const topic = this.resolveTopic(options);
    const topics = await this.withAdmin((admin) => admin.listTopics());
    return topics.includes(topic);
  }

  protected override async doDescribe(options: DatasetOptions): Promise<string> {
    const topic = this.resolveTopic(options);
    const metadata = await this.withAdmin((admin) =>
      admin.fetchTopicMetadata({ topics: [topic] }),
    );
    const partitions = metadata.topics.find((t) => t.name === topic)?.partitions.length ?? 0;
    return [
      `Dataset name: ${this.name}`,
      `Topic: ${topic}`,
      `Partitions: ${partitions}`,
      `Brokers: ${this.brokers.join(",")}`,
    ].join("\n");
  }

  protected override async doClose(): Promise<void> {
    const consumer = this.consumer;
    const producer = this.producer;
    this.consumer = undefined;
    this.producer = undefined;
    this.pausedTopic = undefined;
    this.releaseWaiters();
    if (consumer) await consumer.disconnect();
    if (producer) await producer.disconnect();
  }

  // ---------- Internals ----------

  private async connectConsumer(
    rawConfig: Record<string, unknown>,
    params: ConnectionParams,
  ): Promise<void> {
    if (this.consumer) return;
    const config = ConsumerConfigSchema.parse(rawConfig);
    const topic = this.resolveTopic({});
    const groupId = config.groupId ?? `${params.pipelineName}.${params.nodeName}`;

    const consumer = this.kafka.consumer({
      groupId,
      sessionTimeout: config.sessionTimeout,
    });
    await consumer.connect();
    this.consumer = consumer;
    try {
      await consumer.subscribe({ topics: [topic], fromBeginning: config.fromBeginning });
      await consumer.run({
        eachMessage: async (payload) => this.receive(payload),
      });
    } catch (error) {
      this.consumer = undefined;
      await consumer.disconnect();
      throw error;
    }
    log.debug({ dataset: this.name, topic, groupId }, "Consumer connected");
  }

  private async connectProducer(rawConfig: Record<string, unknown>): Promise<void> {
    if (this.producer) return;
    const config = ProducerConfigSchema.parse(rawConfig);
    const producer = this.kafka.producer(config);
    await producer.connect();
    this.producer = producer;
    log.debug({ dataset: this.name, topic: this.topic }, "Producer connected");
  }

  private receive({ topic, partition, message }: EachMessagePayload): void {
    const raw = message.value?.toString();
    let decoded: unknown;
    try {
      decoded = raw === undefined ? undefined : JSON.parse(raw);
    } catch (error) {
      log.warn(
        { err: error, topic, partition, offset: message.offset },
        "Skipping message that is not valid JSON",
      );
      return;
    }

    const envelope = KafkaEnvelopeSchema.safeParse(decoded);
    if (!envelope.success) {
      log.warn(
        { topic, partition, offset: message.offset },
        "Skipping message without a dataset envelope",
      );
      return;
    }
    this.buffer.push(envelope.data);
    if (this.buffer.length >= this.config.maxBuffered && !this.pausedTopic) {
      this.consumer?.pause([{ topic }]);
      this.pausedTopic = topic;
      log.debug({ dataset: this.name, topic, buffered: this.buffer.length }, "Consumer paused");
    }
    this.releaseWaiters();
  }

  /** Resume fetching once the buffer is down to half its limit. */
  private resumeIfDrained(): void {
    const topic = this.pausedTopic;
    if (!topic || this.buffer.length > Math.floor(this.config.maxBuffered / 2)) {
      return;
    }
    this.pausedTopic = undefined;
    this.consumer?.resume([{ topic }]);
    log.debug({ dataset: this.name, topic }, "Consumer resumed");
  }

  private waitForMessage(timeoutMs: number | undefined): Promise<void> {
    return new Promise((resolve) => {
      let timer: NodeJS.Timeout | undefined;
      const wake = (): void => {
        clearTimeout(timer);
        this.waiters = this.waiters.filter((waiter) => waiter !== wake);
        resolve();
      };
      if (timeoutMs !== undefined) {
        timer = setTimeout(wake, timeoutMs);
      }
      this.waiters.push(wake);
    });
  }

  private releaseWaiters(): void {
    for (const wake of [...this.waiters]) {
      wake();
    }
  }

  private resolveTopic(options: DatasetOptions): string {
    const parsed = TopicOptionsSchema.parse(options);
    if (parsed.pipelineName || parsed.hasPipelinePrefix) {
      this.topic = topicName(this.name, parsed);
    }
    if (!this.topic) {
      throw new Error(
        `Topic of dataset ${this.name} is unknown; pass pipelineName or initialize the dataset first`,
      );
    }
    return this.topic;
  }

  private async withAdmin<T>(operation: (admin: Admin) => Promise<T>): Promise<T> {
    const admin = this.kafka.admin();
    await admin.connect();
    try {
      return await operation(admin);
    } finally {
      await admin.disconnect();
    }
  }
}
