/** JSON envelope returned by every HTTP endpoint. */
export type ApiEnvelope<T> = ApiSuccess<T> | ApiFailure;

export interface ApiSuccess<T> {
  success: true;
  data: T;
}

export interface ApiFailure {
  success: false;
  error: ApiErrorBody;
}

export interface ApiErrorBody {
  code: string;
  message: string;
  requestId: string;
  details?: Record<string, unknown>;
}

/** Body of a 202 response for work handed to the queue. */
export interface QueuedJobView {
  jobId: string;
  documentId: string;
  knowledgeBase: string;
}
