/*
 * Module-keyed logging. SP_LOGGER holds `module:level` pairs separated
 * by `;`, with `*` as the default module. A module named without a
 * level logs at level 1.
 */
export type LogMessage = string | (() => string);

let loggerSettings: Map<string, number> | null = null;
let loggerLevelOffset = 0;
let theLogger: (message: string) => void = (message) => console.log(message);

export function logger(module: string, level: number, message: LogMessage) {
  if (wouldLog(module, level)) {
    log(typeof message === "function" ? message() : message);
  }
}

export function wouldLog(module: string, level: number) {
  const settings = currentSettings();
  return (
    (settings.get(module) ?? settings.get("*") ?? 0) >=
    level + loggerLevelOffset
  );
}

/*
 * Make `module` (or every module, when null) quieter by `amount`
 * levels; negative amounts make it chattier.
 */
export function bumpLogging(module: string | null, amount: number) {
  if (module == null) {
    loggerLevelOffset += amount;
    return;
  }
  const settings = currentSettings();
  const level = settings.get(module);
  if (level != null) {
    settings.set(module, level - amount);
  }
}

export function log(message: string) {
  theLogger(message);
}

export function setLogger(log: (message: string) => void) {
  theLogger = log;
}

/*
 * Re-read SP_LOGGER on next use. Mostly for tests, which
 * change the environment after the first log call.
 */
export function resetLoggerSettings() {
  loggerSettings = null;
  loggerLevelOffset = 0;
}

function currentSettings() {
  if (!loggerSettings) {
    loggerSettings = parseLoggerSettings(process.env["SP_LOGGER"]);
  }
  return loggerSettings;
}

function parseLoggerSettings(spec: string | undefined) {
  const settings = new Map<string, number>();
  spec?.split(";").forEach((entry) => {
    const [module, level] = entry.split(/[:=]/, 2);
    if (!module) return;
    settings.set(module, level == null ? 1 : Number(level));
  });
  return settings;
}
