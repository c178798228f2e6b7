export function log(message: string, source = "express") {
  const formattedTime = new Date().toLocaleTimeString("en-US", {
    hour: "numeric",
    minute: "2-digit",
    second: "2-digit",
    hour12: true,
  });

  console.log(`${formattedTime} [${source}] ${message}`);
}

export function logError(message: string, error: unknown, source = "express") {
  const detail = error instanceof Error ? error.message : String(error);
  console.error(`[${source}] ${message}: ${detail}`);
}
