import fs from "fs";
import path from "path";
import { fileURLToPath } from "url";
import { controlCommandSchema } from "../shared/schema";
import { buildCapabilitiesPayload } from "../shared/protocol-utils";

const COMMANDS_MARKERS = ["<!-- PROTOCOL:COMMANDS:START -->", "<!-- PROTOCOL:COMMANDS:END -->"] as const;
const RESPONSES_MARKERS = ["<!-- PROTOCOL:RESPONSES:START -->", "<!-- PROTOCOL:RESPONSES:END -->"] as const;

function replaceSection(content: string, [start, end]: readonly [string, string], body: string) {
  const startIndex = content.indexOf(start);
  const endIndex = content.indexOf(end);
  if (startIndex === -1 || endIndex === -1 || endIndex <= startIndex) {
    throw new Error(`Missing or invalid markers: ${start} / ${end}`);
  }
  return `${content.slice(0, startIndex + start.length)}\n${body}\n${content.slice(endIndex)}`;
}

function renderCommands(): string {
  const rows = controlCommandSchema.options.map((option) => {
    const args = Object.keys(option.shape).filter((key) => key !== "type" && key !== "request_id");
    const argText = args.length > 0 ? args.map((arg) => `\`${arg}\``).join(", ") : "none";
    return `| \`${option.shape.type.value}\` | ${argText} |`;
  });
  return ["| Command | Arguments |", "| --- | --- |", ...rows].join("\n");
}

function renderResponses(): string {
  return buildCapabilitiesPayload()
    .responses.map((type) => `- \`${type}\``)
    .join("\n");
}

function main() {
  const checkOnly = process.argv.slice(2).includes("--check");
  const usagePath = path.resolve(path.dirname(fileURLToPath(import.meta.url)), "..", "USAGE.md");
  const usage = fs.readFileSync(usagePath, "utf8");

  const next = replaceSection(
    replaceSection(usage, COMMANDS_MARKERS, renderCommands()),
    RESPONSES_MARKERS,
    renderResponses(),
  );

  if (checkOnly) {
    if (next !== usage) {
      console.error("[protocol-docs] USAGE.md is out of date. Run: npm run docs:protocol");
      process.exit(1);
    }
    console.log("[protocol-docs] USAGE.md is in sync.");
    return;
  }

  if (next === usage) {
    console.log("[protocol-docs] USAGE.md already up to date.");
    return;
  }
  fs.writeFileSync(usagePath, next, "utf8");
  console.log("[protocol-docs] Updated USAGE.md.");
}

main();
