import { Test } from '@nestjs/testing';
import { AnnotationGuardsService } from '../src/modules/feedback/annotation/services/annotation-guards.service';
import { buildTestSettings, testConfigModule } from './support/test-config';

const createGuards = async (maxConcurrency: number) => {
  const moduleRef = await Test.createTestingModule({
    imports: [
      testConfigModule(
        buildTestSettings('/tmp', { feedback: { maxConcurrency } }),
      ),
    ],
    providers: [AnnotationGuardsService],
  }).compile();
  return moduleRef.get(AnnotationGuardsService);
};

const waitMs = (ms: number) =>
  new Promise((resolve) => setTimeout(resolve, ms));

describe('AnnotationGuardsService', () => {
  it('never runs more tasks than the limit', async () => {
    const guards = await createGuards(2);
    let inFlight = 0;
    let maxInFlight = 0;
    const finished: number[] = [];

    await Promise.all(
      [0, 1, 2, 3, 4].map((index) =>
        guards.withSlot(async () => {
          inFlight += 1;
          maxInFlight = Math.max(maxInFlight, inFlight);
          await waitMs(10);
          inFlight -= 1;
          finished.push(index);
        }),
      ),
    );

    expect(maxInFlight).toBe(2);
    expect(finished.sort()).toEqual([0, 1, 2, 3, 4]);
  });

  it('frees the slot when a task throws', async () => {
    const guards = await createGuards(1);

    await expect(
      guards.withSlot(async () => {
        await waitMs(1);
        throw new Error('boom');
      }),
    ).rejects.toThrow('boom');
    await expect(guards.withSlot(async () => 'next')).resolves.toBe('next');
  });

  it('ignores a second release', async () => {
    const guards = await createGuards(1);
    const release = await guards.acquire();
    release();
    release();

    const first = await guards.acquire();
    let secondAcquired = false;
    const second = guards.acquire().then((releaseSecond) => {
      secondAcquired = true;
      releaseSecond();
    });
    await waitMs(5);
    expect(secondAcquired).toBe(false);

    first();
    await second;
    expect(secondAcquired).toBe(true);
  });

  it('treats a limit below one as one', async () => {
    expect((await createGuards(0)).limit).toBe(1);
  });
});
