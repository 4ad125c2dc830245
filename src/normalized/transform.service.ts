import { Injectable, Logger } from '@nestjs/common';
import type { RawCommit } from '../raw/github-client-interface.js';
import { transformCommits } from './transformer.js';
import type { NormalizedBundle } from './types.js';

@Injectable()
export class TransformService {
  private readonly logger = new Logger(TransformService.name);

  transform(rawCommits: Iterable<RawCommit>): NormalizedBundle {
    const bundle = transformCommits(rawCommits);
    this.logger.log(
      `Normalized ${bundle.commits.length} commits and ${bundle.identities.length} identities`,
    );
    if (bundle.skipped > 0) {
      this.logger.warn(`Skipped ${bundle.skipped} commits without a sha or timestamps`);
    }
    return bundle;
  }
}
