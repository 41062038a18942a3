// stdout belongs to the pipeline; status goes to stderr
export const log = {
  info: (m: string) => console.error(`[info] ${m}`),
  err: (m: string) => console.error(`[err] ${m}`),
};
