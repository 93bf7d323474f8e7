import { Test } from '@nestjs/testing';
import { ConfigService } from '@nestjs/config';
import { AutocheckScheduler } from './autocheck.scheduler';
import { AutocheckService } from './autocheck.service';
import { AutocheckOptions, AutocheckSummary } from './autocheck.types';

function emptySummary(): AutocheckSummary {
  return {
    runId: 'run-1',
    asOf: '2024-01-02',
    startedAt: new Date('2024-01-02T02:00:00.000Z'),
    finishedAt: new Date('2024-01-02T02:00:01.000Z'),
    examined: 0,
    granted: [],
    revoked: [],
    denied: [],
    unchanged: [],
    errors: [],
    cancelled: [],
    runAudited: true,
  };
}

describe('AutocheckScheduler', () => {
  let scheduler: AutocheckScheduler;
  let runAutocheck: jest.Mock<
    Promise<AutocheckSummary>,
    [Date | undefined, AutocheckOptions | undefined]
  >;
  let enabled: boolean;

  beforeEach(async () => {
    enabled = true;
    runAutocheck = jest.fn();

    const module = await Test.createTestingModule({
      providers: [
        AutocheckScheduler,
        { provide: AutocheckService, useValue: { runAutocheck } },
        {
          provide: ConfigService,
          useValue: {
            get: jest.fn((key: string) =>
              key === 'compliance.autocheckEnabled' ? enabled : undefined,
            ),
          },
        },
      ],
    }).compile();
    module.useLogger(false);

    scheduler = module.get(AutocheckScheduler);
  });

  it('runs the autocheck with a cancellation signal', async () => {
    runAutocheck.mockResolvedValue(emptySummary());

    await expect(scheduler.handleNightlyAutocheck()).resolves.toEqual(
      emptySummary(),
    );
    expect(runAutocheck).toHaveBeenCalledWith(undefined, {
      signal: expect.any(AbortSignal),
    });
  });

  it('does nothing when disabled', async () => {
    enabled = false;

    await expect(scheduler.handleNightlyAutocheck()).resolves.toBeNull();
    expect(runAutocheck).not.toHaveBeenCalled();
  });

  it('skips a tick while the previous run is still going', async () => {
    let finish: (summary: AutocheckSummary) => void = () => undefined;
    runAutocheck.mockReturnValueOnce(
      new Promise((resolve) => {
        finish = resolve;
      }),
    );

    const first = scheduler.handleNightlyAutocheck();
    await expect(scheduler.handleNightlyAutocheck()).resolves.toBeNull();

    finish(emptySummary());
    await expect(first).resolves.toEqual(emptySummary());
    expect(runAutocheck).toHaveBeenCalledTimes(1);
  });

  it('aborts the in-flight run on shutdown', async () => {
    let signal: AbortSignal | undefined;
    let finish: (summary: AutocheckSummary) => void = () => undefined;
    runAutocheck.mockImplementationOnce((_asOf, options) => {
      signal = options?.signal;
      return new Promise((resolve) => {
        finish = resolve;
      });
    });

    const run = scheduler.handleNightlyAutocheck();
    scheduler.onApplicationShutdown();

    expect(signal?.aborted).toBe(true);
    finish(emptySummary());
    await run;
  });

  it('logs and swallows a failed run', async () => {
    runAutocheck.mockRejectedValueOnce(new Error('database unavailable'));

    await expect(scheduler.handleNightlyAutocheck()).resolves.toBeNull();
  });
});
