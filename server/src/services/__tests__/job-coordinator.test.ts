import assert from 'node:assert/strict';
import { describe, test } from 'node:test';

import { buildSegments } from '../../core/context-builder';
import { NotReadyError } from '../../core/errors';
import { TranslationEngine } from '../../core/translation-engine';
import { JobCoordinator, progressPercent, type JobCoordinatorOptions } from '../job-coordinator';
import { StubTranslator, completion, deferred, delay, fakeHttp, flush, httpError } from '../../__tests__/helpers';
import type { Segment } from '../../types/segmentation';
import type { SourceDocument, Translator } from '../../types/translation';

const document: SourceDocument = {
  text: 'One one. Two two. Three three.',
  instructions: 'Translate to French',
  filename: 'story.txt',
  targetLanguage: 'fr'
};

function segmentsOf(...texts: string[]): Segment[] {
  return buildSegments(
    texts.map((text, i) => ({ text, leading: '', separator: i < texts.length - 1 ? ' ' : '' })),
    100
  );
}

function createCoordinator(
  segments: Segment[],
  translator: Translator,
  overrides: Partial<JobCoordinatorOptions> = {}
): JobCoordinator {
  return new JobCoordinator('job-1', document, segments, {
    translator,
    concurrency: 4,
    maxAttempts: 3,
    retryBaseDelayMs: 1,
    maxRetryDelayMs: 5,
    stallTimeoutMs: 5000,
    ...overrides
  });
}

describe('progressPercent', () => {
  test('rounds down to a whole percentage', () => {
    assert.equal(progressPercent(0, 3), 0);
    assert.equal(progressPercent(1, 3), 33);
    assert.equal(progressPercent(29, 100), 29);
    assert.equal(progressPercent(3, 3), 100);
    assert.equal(progressPercent(0, 0), 0);
  });
});

describe('JobCoordinator', () => {
  test('refuses a job without segments', () => {
    assert.throws(() => createCoordinator([], new StubTranslator()), RangeError);
  });

  test('starts queued with zero progress', () => {
    const coordinator = createCoordinator(segmentsOf('a'), new StubTranslator());

    const snapshot = coordinator.snapshot();
    assert.equal(snapshot.status, 'queued');
    assert.equal(snapshot.progress, 0);
    assert.equal(snapshot.totalCount, 1);
    assert.throws(() => coordinator.getResult(), NotReadyError);
  });

  test('translates a single segment document', async () => {
    const coordinator = createCoordinator(segmentsOf('Sentence one. Sentence two.'), new StubTranslator());

    const final = await coordinator.run();

    assert.equal(final.status, 'completed');
    assert.equal(final.progress, 100);
    assert.equal(coordinator.getResult(), '[Sentence one. Sentence two.]');
    assert.ok(coordinator.finishedAt instanceof Date);
  });

  test('reassembles segments in source order and reports monotonic progress', async () => {
    const translator = new StubTranslator(call => call.text.toUpperCase());
    const coordinator = createCoordinator(segmentsOf('One one.', 'Two two.', 'Three three.'), translator);
    const progress: number[] = [];
    coordinator.onProgress(snapshot => progress.push(snapshot.progress));

    const final = await coordinator.run();

    assert.equal(final.status, 'completed');
    assert.equal(coordinator.getResult(), 'ONE ONE. TWO TWO. THREE THREE.');
    assert.deepEqual(progress, [33, 66, 100, 100]);
    assert.deepEqual(translator.calls.map(c => c.context), ['', 'One one.', 'One one. Two two.']);
    assert.ok(translator.calls.every(c => c.instructions === 'Translate to French'));
  });

  test('output does not depend on completion order', async () => {
    const texts = ['a', 'b', 'c', 'd', 'e'];
    const orders = [
      [0, 4, 8, 12, 16],
      [16, 12, 8, 4, 0],
      [8, 0, 16, 4, 12]
    ];

    for (const delays of orders) {
      const completed: string[] = [];
      const translator = new StubTranslator(async call => {
        await delay(delays[texts.indexOf(call.text)]);
        completed.push(call.text);
        return call.text.toUpperCase();
      });
      const coordinator = createCoordinator(segmentsOf(...texts), translator, { concurrency: 5 });

      await coordinator.run();

      assert.equal(coordinator.getResult(), 'A B C D E');
      assert.equal(completed.length, 5);
    }
  });

  test('fails the whole job when a segment exhausts its retries', async () => {
    const translator = new StubTranslator(call => {
      if (call.text === 'Two two.') throw new Error('boom');
      return call.text;
    });
    const coordinator = createCoordinator(segmentsOf('One one.', 'Two two.', 'Three three.'), translator);

    const final = await coordinator.run();

    assert.equal(final.status, 'failed');
    assert.deepEqual(final.error, {
      code: 'TRANSLATION_FAILED',
      message: 'Échec de la traduction du segment 1 après 3 tentative(s): boom',
      segmentIndex: 1
    });
    assert.equal(translator.calls.filter(c => c.text === 'Two two.').length, 3);
    assert.throws(() => coordinator.getResult(), NotReadyError);
  });

  test('fails with a timeout when no segment completes in time', async () => {
    const coordinator = createCoordinator(
      segmentsOf('a', 'b'),
      new StubTranslator(() => new Promise<string>(() => undefined)),
      { stallTimeoutMs: 20 }
    );

    const final = await coordinator.run();

    assert.equal(final.status, 'failed');
    assert.deepEqual(final.error, { code: 'JOB_TIMEOUT', message: 'Job job-1 sans progression depuis 20 ms' });
    assert.equal(final.completedCount, 0);
  });

  test('cancel stops dispatch and discards late results', async () => {
    const gate = deferred<string>();
    const translator = new StubTranslator(() => gate.promise);
    const coordinator = createCoordinator(segmentsOf('a', 'b', 'c'), translator, { concurrency: 1 });

    const terminal = coordinator.run();
    await flush();
    coordinator.cancel();
    const final = await terminal;
    gate.resolve('late');
    await flush();

    assert.equal(final.status, 'failed');
    assert.equal(final.error?.code, 'JOB_CANCELLED');
    assert.equal(coordinator.snapshot().completedCount, 0);
    assert.equal(translator.calls.length, 1);
  });

  test('a second run does not dispatch again', async () => {
    const translator = new StubTranslator();
    const coordinator = createCoordinator(segmentsOf('a', 'b'), translator);

    await coordinator.run();
    const again = await coordinator.run();

    assert.equal(again.status, 'completed');
    assert.equal(translator.calls.length, 2);
  });

  test('whenSettled shares one pending promise between callers', async () => {
    const coordinator = createCoordinator(segmentsOf('a'), new StubTranslator());

    const first = coordinator.whenSettled();
    const second = coordinator.whenSettled();
    assert.equal(first, second);

    await coordinator.run();
    assert.equal((await first).status, 'completed');
    assert.equal((await coordinator.whenSettled()).status, 'completed');
  });

  test('jobs sharing an engine complete after a short service outage', async () => {
    let requests = 0;
    const { http } = fakeHttp(config => {
      requests++;
      if (requests <= 3) throw httpError(config, 503);
      return completion(config, 'ok');
    });
    const engine = new TranslationEngine(
      { apiUrl: 'https://api.test/v1', apiKey: 'test-secret', model: 'test-model', timeoutMs: 1000, resetTimeoutMs: 20 },
      http
    );
    const options = { concurrency: 3, maxAttempts: 3 };

    try {
      const jobs = [
        createCoordinator(segmentsOf('a', 'b', 'c', 'd', 'e', 'f'), engine, options),
        createCoordinator(segmentsOf('g', 'h', 'i', 'j', 'k', 'l'), engine, options)
      ];

      const snapshots = await Promise.all(jobs.map(job => job.run()));

      assert.deepEqual(snapshots.map(snapshot => snapshot.status), ['completed', 'completed']);
      for (const job of jobs) {
        assert.equal(job.getResult(), 'ok ok ok ok ok ok');
      }
    } finally {
      engine.shutdown();
    }
  });

  test('a job cancelled before it starts never runs', async () => {
    const translator = new StubTranslator();
    const coordinator = createCoordinator(segmentsOf('a'), translator);

    coordinator.cancel();
    const snapshot = await coordinator.run();

    assert.equal(snapshot.status, 'queued');
    assert.equal(coordinator.isCancelled, true);
    assert.equal(translator.calls.length, 0);
  });
});
