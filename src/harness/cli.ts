import { createInterface } from "node:readline";
import { readFileSync } from "node:fs";
import { DEFAULT_LEVEL_SEED, DEFAULT_LEVEL_WIDTH, DEFAULT_LEVEL_HEIGHT, PLACEMENT_SEED } from "../shared/constants.js";
import type { GameContext, LevelFile, PortalConfig } from "../shared/types.js";
import { parseLevelFile } from "../sim/levelgen.js";
import { parseCommand, scriptLines } from "./commandParser.js";
import { loadLevel, executeCommand } from "./session.js";
import type { CliArgs } from "./types.js";

// ── Arg parsing ──────────────────────────────────────────────

function fail(message: string): never {
  console.error(`ERROR: ${message}`);
  process.exit(1);
}

function parseIntArg(flag: string, value: string | undefined, min: number): number {
  const n = parseInt(value ?? "", 10);
  if (Number.isNaN(n) || n < min) fail(`${flag} requires an integer >= ${min}`);
  return n;
}

function parseArgs(): CliArgs {
  const argv = process.argv.slice(2);
  const opts: CliArgs = {
    level: null,
    seed: DEFAULT_LEVEL_SEED,
    width: DEFAULT_LEVEL_WIDTH,
    height: DEFAULT_LEVEL_HEIGHT,
    enable: false,
    baseSeed: PLACEMENT_SEED,
    minSegment: null,
    maxSegment: null,
    preferredSegment: null,
    script: null,
  };

  for (let i = 0; i < argv.length; i++) {
    switch (argv[i]) {
      case "--level":
        opts.level = argv[++i] ?? fail("--level requires a path");
        break;
      case "--seed":
        opts.seed = parseIntArg("--seed", argv[++i], 0);
        break;
      case "--width":
        opts.width = parseIntArg("--width", argv[++i], 10);
        break;
      case "--height":
        opts.height = parseIntArg("--height", argv[++i], 10);
        break;
      case "--enable":
        opts.enable = true;
        break;
      case "--base-seed": {
        const raw = argv[++i] ?? "";
        if (!/^-?\d+$/.test(raw)) fail("--base-seed requires an integer");
        opts.baseSeed = BigInt(raw);
        break;
      }
      case "--min-segment":
        opts.minSegment = parseIntArg("--min-segment", argv[++i], 1);
        break;
      case "--max-segment":
        opts.maxSegment = parseIntArg("--max-segment", argv[++i], 1);
        break;
      case "--preferred-segment":
        opts.preferredSegment = parseIntArg("--preferred-segment", argv[++i], 1);
        break;
      case "--script":
        opts.script = argv[++i] ?? fail("--script requires a path");
        break;
      default:
        console.error(`WARNING: Unknown argument "${argv[i]}"`);
        break;
    }
  }

  return opts;
}

function portalConfigFromArgs(args: CliArgs): Partial<PortalConfig> {
  const config: Partial<PortalConfig> = { featureEnabled: args.enable, baseSeed: args.baseSeed };
  if (args.minSegment !== null) config.minSegmentLength = args.minSegment;
  if (args.maxSegment !== null) config.maxSegmentLength = args.maxSegment;
  if (args.preferredSegment !== null) config.preferredSegmentLength = args.preferredSegment;
  return config;
}

function readLevel(args: CliArgs): LevelFile {
  if (!args.level) {
    return { name: `generated-${args.seed}`, seed: args.seed, width: args.width, height: args.height, puzzles: [] };
  }
  try {
    return parseLevelFile(readFileSync(args.level, "utf-8"));
  } catch (err) {
    fail(`Could not load level "${args.level}": ${err}`);
  }
}

// ── Command loop ─────────────────────────────────────────────

/** Run one line; returns false once the session should end. */
function runLine(game: GameContext, line: string): boolean {
  const command = parseCommand(line);
  if ("error" in command) {
    console.log(`===ERROR=== ${command.error}`);
    return true;
  }
  for (const out of executeCommand(game, command)) console.log(out);
  return command.kind !== "quit";
}

function runScript(scriptPath: string, game: GameContext): void {
  let content: string;
  try {
    content = readFileSync(scriptPath, "utf-8");
  } catch (err) {
    fail(`Could not read script file "${scriptPath}": ${err}`);
  }
  for (const line of scriptLines(content)) {
    if (!runLine(game, line)) break;
  }
}

async function runInteractive(game: GameContext): Promise<void> {
  const rl = createInterface({ input: process.stdin, output: process.stdout, terminal: false });
  for await (const line of rl) {
    if (line.trim().length === 0) continue;
    if (!runLine(game, line)) break;
  }
  rl.close();
}

// ── Main ─────────────────────────────────────────────────────

async function main(): Promise<void> {
  const args = parseArgs();
  const level = readLevel(args);

  let game: GameContext;
  try {
    game = loadLevel(level, portalConfigFromArgs(args));
  } catch (err) {
    fail(`Invalid portal settings: ${err}`);
  }

  console.log(`Portal harness v0.1  Level: ${level.name}`);
  console.log(`Portals: ${game.portals.config.featureEnabled ? "enabled" : "disabled"}  Base seed: ${game.portals.config.baseSeed}`);
  console.log("");

  if (args.script) {
    runScript(args.script, game);
  } else {
    await runInteractive(game);
  }
}

main().catch((err) => {
  console.error("Fatal error:", err);
  process.exit(1);
});
