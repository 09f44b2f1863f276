// Centralized key naming so you don't scatter magic strings
export const RKeys = {
  // refresh sessions: one per RT jti
  rtSession: (userId: string, jti: string) => `rt:${userId}:${jti}`,
  rtSessionPattern: (userId: string) => `rt:${userId}:*`,
};
