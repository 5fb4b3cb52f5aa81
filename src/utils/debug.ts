export type DebugLog = (message: string) => void;

export const noopDebugLog: DebugLog = () => {};

/**
 * Debug logger that writes to stderr only when debug mode is on
 */
export function createDebugLog(enabled: boolean): DebugLog {
  return (message: string) => {
    if (enabled) {
      console.error(`[DEBUG] ${message}`);
    }
  };
}
