export type ProcessingStatus =
  | 'created'
  | 'textExtracted'
  | 'segmentsReady'
  | 'translating'
  | 'completed'
  | 'failed'
  | 'retrying';

const PROGRESS: Record<ProcessingStatus, number> = {
  created: 0.1,
  textExtracted: 0.3,
  segmentsReady: 0.5,
  translating: 0.8,
  completed: 1.0,
  failed: 0.0,
  retrying: 0.2,
};

export const statusProgress = (status: ProcessingStatus) => PROGRESS[status];

export const isCompleted = (status: ProcessingStatus) => status === 'completed';

export const isProcessing = (status: ProcessingStatus) => status === 'translating' || status === 'retrying';

export const isFailed = (status: ProcessingStatus) => status === 'failed';

export const isProcessingStatus = (value: unknown): value is ProcessingStatus =>
  typeof value === 'string' && Object.prototype.hasOwnProperty.call(PROGRESS, value);
