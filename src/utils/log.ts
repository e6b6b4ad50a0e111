type LogTarget = "stdout" | "stderr";

function envFlag(name: string) {
  const value = process.env[name];
  return value === "1" || value === "true";
}

const settings: { target: LogTarget; debug: boolean; quiet: boolean } = {
  target: envFlag("CODEARTIFACT_SSO_LOG_STDERR") ? "stderr" : "stdout",
  debug: envFlag("CODEARTIFACT_SSO_DEBUG"),
  quiet: envFlag("CODEARTIFACT_SSO_QUIET"),
};

export function configureLogging(options: {
  target?: LogTarget;
  verbose?: boolean;
  quiet?: boolean;
}) {
  if (options.target) {
    settings.target = options.target;
  }
  if (options.verbose !== undefined) {
    settings.debug = options.verbose;
  }
  if (options.quiet !== undefined) {
    settings.quiet = options.quiet;
  }
}

function logLine(message: string) {
  if (settings.target === "stderr") {
    console.error(message);
    return;
  }
  console.log(message);
}

export function info(message: string) {
  if (settings.quiet) {
    return;
  }
  logLine(message);
}

/** Shown even when quiet: the user has to act on it. */
export function notice(message: string) {
  logLine(message);
}

export function warn(message: string) {
  console.error(message);
}

export function error(message: string) {
  console.error(message);
}

export function debug(message: string) {
  if (!settings.debug) {
    return;
  }
  logLine(message);
}
