/**
 * Wires a TutorSession from a database connection and a collaborator,
 * applying the dedup and scheduler settings from the configuration.
 */

import { config as appConfig, type Config } from '../../config';
import type { AppDatabase } from '../../storage/db';
import { FactRepository } from '../../storage/repositories/fact.repository';
import { InteractionRepository } from '../../storage/repositories/interaction.repository';
import { ReviewStateRepository } from '../../storage/repositories/review-state.repository';
import type { TutorCollaborator } from '../../llm/types';
import { DedupEngine } from '../dedup';
import { ReviewQueue, Scheduler } from '../scheduler';
import { TutorSession } from './tutor-session';
import type { TutorSessionConfig } from './types';

export function createTutorSession(
  db: AppDatabase,
  collaborator: TutorCollaborator,
  settings: Config = appConfig,
  sessionConfig: Partial<TutorSessionConfig> = {}
): TutorSession {
  const scheduler = new Scheduler(settings.scheduler);
  return new TutorSession(
    {
      factStore: new FactRepository(db),
      reviewQueue: new ReviewQueue(new ReviewStateRepository(db), scheduler),
      interactions: new InteractionRepository(db),
      collaborator,
      dedup: new DedupEngine(collaborator, settings.dedup),
    },
    sessionConfig
  );
}
