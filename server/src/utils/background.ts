// Fire-and-forget work scheduled after a response; failures are logged under `label`.
export const runInBackground = (label: string, task: () => Promise<unknown>): void => {
  setImmediate(() => {
    task().catch((error: unknown) => {
      console.error(`[${label}] background task failed:`, error);
    });
  });
};
