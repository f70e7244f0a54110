export interface MetamodelDebugLogger {
  model: (...args: unknown[]) => void;
  error: (...args: unknown[]) => void;
}

let debugLogger: MetamodelDebugLogger = {
  model: () => undefined,
  error: () => undefined,
};

let ownerReleaseEnabled = false;

export const debug = {
  model: (...args: unknown[]) => {
    debugLogger.model(...args);
  },
  error: (...args: unknown[]) => {
    debugLogger.error(...args);
  },
};

export const setDebugLogger = (logger: MetamodelDebugLogger): void => {
  debugLogger = logger;
};

/**
 * When enabled, replacing a member collection (attributes, methods, literals)
 * clears the owner of every member that was dropped from it. Disabled by
 * default, in which case dropped members keep pointing at their former owner.
 */
export const setOwnerReleaseEnabled = (enabled: boolean): void => {
  ownerReleaseEnabled = enabled;
};

export const isOwnerReleaseEnabled = (): boolean => ownerReleaseEnabled;
