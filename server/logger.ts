/** Sources whose lines go to stderr. */
const ERROR_SOURCES = new Set(["error", "fatal"]);

export function log(message: string, source = "http") {
  const formattedTime = new Date().toLocaleTimeString("en-US", {
    hour: "numeric",
    minute: "2-digit",
    second: "2-digit",
    hour12: true,
  });

  const line = `${formattedTime} [${source}] ${message}`;
  if (ERROR_SOURCES.has(source)) {
    console.error(line);
  } else {
    console.log(line);
  }
}
