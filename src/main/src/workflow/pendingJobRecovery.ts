import { DataSource } from 'typeorm';
import { logToFile } from '../../log';
import { ProcessingJobEntity } from '../data/entity/ProcessingJob';
import { NoteService } from '../note/noteService';
import { DAY } from '../utils/time';
import { PostProcessingQueue } from './postProcessingQueue';

export const MAX_PENDING_JOB_AGE_MS = DAY;

/** Picks up jobs an earlier run left behind; jobs older than a day fail their note instead. */
export const recoverPendingJobs = async (
  dataSource: DataSource,
  notes: NoteService,
  queue: Pick<PostProcessingQueue, 'enqueueExisting'>,
  now: () => number = Date.now,
) => {
  const rows = await dataSource.manager.find(ProcessingJobEntity, { order: { createdAt: 'ASC' } });
  let recovered = 0;
  let expired = 0;
  // Runs before the queue starts, so a row still marked running was cut off mid-translation.
  for (const row of rows) {
    if (now() - row.createdAt > MAX_PENDING_JOB_AGE_MS) {
      await dataSource.manager.delete(ProcessingJobEntity, { id: row.id });
      const note = await notes.getNote(row.noteId);
      if (note) {
        await notes.updateProcessingStatus(row.noteId, 'failed', { error: 'processing did not finish in time' });
      }
      expired += 1;
      continue;
    }
    queue.enqueueExisting({ ...row.payload, retryCount: row.retryCount });
    recovered += 1;
  }
  logToFile('pending jobs recovered:', recovered, 'expired:', expired);
  return { recovered, expired };
};
