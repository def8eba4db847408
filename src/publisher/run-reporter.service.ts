import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { mkdir, writeFile } from 'fs/promises';
import { dirname, resolve } from 'path';
import { ALL_PLATFORMS } from '../common/interfaces';
import { getErrorMessage, getErrorStack } from '../common/utils/error.utils';
import { getRunSummaryPath } from '../config/publisher.config';
import { ItemReport, PlatformOutcome, RunSummary } from './interfaces';

export function describeOutcome(outcome: PlatformOutcome): string {
  switch (outcome.status) {
    case 'posted':
      return `posted ${outcome.postReference.id}`;
    case 'failed':
      return `failed ${outcome.errorKind} after ${outcome.attempts} attempt(s)`;
    case 'skipped':
      return `skipped ${outcome.reason}`;
    default: {
      const _exhaustiveCheck: never = outcome;
      return _exhaustiveCheck;
    }
  }
}

/**
 * Run Reporter
 * Log sink for item outcomes and the run summary. Optionally writes the
 * summary as JSON to RUN_SUMMARY_PATH.
 */
@Injectable()
export class RunReporter {
  private readonly logger = new Logger(RunReporter.name);
  private readonly summaryPath?: string;

  constructor(configService: ConfigService) {
    const path = getRunSummaryPath(configService);
    this.summaryPath = path ? resolve(path) : undefined;
  }

  itemCompleted(report: ItemReport): void {
    const outcomes = ALL_PLATFORMS.flatMap((platform) => {
      const outcome = report.outcomes[platform];
      return outcome ? [`${platform}=${describeOutcome(outcome)}`] : [];
    }).join(' ');
    this.logger.log(`"${report.title}" ${outcomes}`);
  }

  async runCompleted(summary: RunSummary): Promise<void> {
    const posted = summary.targets
      .map((platform) => `${platform}=${summary.posted[platform]}`)
      .join(' ');

    this.logger.log(
      `Run finished: fetched=${summary.fetched} filtered=${summary.filtered} ` +
        `duplicates=${summary.duplicates} posted[${posted}] ` +
        `skipped=${summary.skipped} failed=${summary.failed} ` +
        `sourceFailures=${summary.sourceFailures.length}`,
    );

    for (const failure of summary.sourceFailures) {
      this.logger.warn(`Source failed: ${failure.source}: ${failure.message}`);
    }
    if (summary.unavailablePlatforms.length > 0) {
      this.logger.warn(
        `Unavailable this run: ${summary.unavailablePlatforms.join(', ')}`,
      );
    }

    if (!this.summaryPath) {
      return;
    }

    try {
      await mkdir(dirname(this.summaryPath), { recursive: true });
      await writeFile(
        this.summaryPath,
        `${JSON.stringify(summary, null, 2)}\n`,
        'utf8',
      );
      this.logger.log(`Run summary written to ${this.summaryPath}`);
    } catch (error) {
      // The posts are already recorded in the ledger; only the report is lost
      this.logger.error(
        `Failed to write run summary to ${this.summaryPath}: ${getErrorMessage(error)}`,
        getErrorStack(error),
      );
    }
  }
}
