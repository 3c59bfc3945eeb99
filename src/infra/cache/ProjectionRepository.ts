import { isSameDay } from '../../domain/calendar.js';
import type { ProjectionSnapshot } from '../../domain/entities/Snapshots.js';
import type { KeyValueContainer } from '../container/KeyValueContainer.js';
import { JsonRecordRepository } from './JsonRecordRepository.js';
import { projectionSnapshotSchema } from './records.js';

export const PROJECTION_FILE_NAME = 'projection-state.json';

export class ProjectionRepository extends JsonRecordRepository<ProjectionSnapshot> {
  constructor(container: KeyValueContainer) {
    super(container, PROJECTION_FILE_NAME, projectionSnapshotSchema);
  }

  isValid(snapshot: ProjectionSnapshot, now: Date): boolean {
    return isSameDay(snapshot.observedAt, now);
  }
}
