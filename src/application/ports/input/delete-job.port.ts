/**
 * Delete Job Port (Driving Port / Use Case Interface)
 * Forgets a terminal job and removes its images
 */
export interface DeleteJobPort {
  /**
   * Fails with JobNotFoundError for unknown ids and JobStateConflictError
   * while the job is still running.
   */
  execute(jobId: string): Promise<void>;
}
