import type { Readable } from 'node:stream';

import { isProcessError } from './diagnostics/errors.js';
import { DiagnosticIds } from './diagnostics/types.js';
import { createStreamSink } from './formats/sink.js';
import type { StreamSink } from './formats/sink.js';
import type { RenderConfig } from './formats/types.js';
import type { ExternalCommand } from './process/command.js';
import { transform } from './transform.js';

/**
 * Transform `source` into `sink`, then end the sink whatever the outcome.
 *
 * Ending the consumer's stdin is the only end-of-stream signal it gets. Output the producer writes
 * after the transform stops is read and discarded so the producer can run to completion.
 */
async function transformStage(
  sink: StreamSink,
  source: Readable,
  config: RenderConfig,
): Promise<void> {
  try {
    await transform(sink, source, config);
  } finally {
    sink.end();
    source.resume();
  }
  await sink.finished();
}

/**
 * Run `producer | transform | consumer` to completion.
 *
 * The transform stage, the producer and the consumer run concurrently and are all awaited. A process that
 * could not be started is reported ahead of everything else. Otherwise, when several fail, the error
 * reported is that of the first in that order, not the first in time. No signal is sent to either
 * process when another stage fails, and nothing times out: a process that never exits keeps the
 * pipeline waiting.
 */
export async function runPipeline(
  producer: ExternalCommand,
  consumer: ExternalCommand,
  config: RenderConfig,
): Promise<void> {
  producer.start();
  consumer.start();
  const source = producer.stdout();
  const sink = createStreamSink(consumer.stdin());

  const results = await Promise.allSettled([
    transformStage(sink, source, config),
    producer.wait(),
    consumer.wait(),
  ]);
  const failures: unknown[] = results.flatMap((result) =>
    result.status === 'rejected' ? [result.reason] : [],
  );
  const notStarted = failures.find(
    (err) => isProcessError(err) && err.id === DiagnosticIds.ProcessSpawnFailed,
  );
  if (notStarted !== undefined) throw notStarted;
  if (failures.length > 0) throw failures[0];
}
