import "dotenv/config";

import { castHexagram } from "./oracle/divination/castHexagram.js";
import { randomCoinSource, seededCoinSource } from "./oracle/divination/coinSource.js";

function parseArgs(): { seed: number | null } {
  const args = process.argv.slice(2);
  let seed: number | null = null;

  for (let i = 0; i < args.length; i++) {
    if (args[i] === "--seed" && i + 1 < args.length) {
      seed = parseInt(args[i + 1], 10);
      if (isNaN(seed)) {
        throw new Error("--seed must be an integer");
      }
      i++;
    }
  }

  return { seed };
}

/** Usage: run-cast.ts [--seed 42] */
function main() {
  const { seed } = parseArgs();
  const coins = seed === null ? randomCoinSource() : seededCoinSource(seed);
  const hexagram = castHexagram({ coins });

  const describe = (label: string, name: string, symbol: string) =>
    console.log(`[cast] ${label}: ${symbol} ${name}`);

  describe("primary", hexagram.hexagram.name, hexagram.hexagram.symbol);
  console.log(`[cast] lines (bottom→top): ${hexagram.lines.map((l) => l.value).join(" ")}`);
  if (hexagram.future) {
    describe("future", hexagram.future.hexagram.name, hexagram.future.hexagram.symbol);
  }
}

if (process.argv[1]) {
  const invokedPath = (() => {
    try {
      return new URL(`file://${process.argv[1]}`).href;
    } catch {
      return undefined;
    }
  })();
  if (invokedPath && invokedPath === import.meta.url) {
    try {
      main();
    } catch (err) {
      console.error(err);
      process.exit(1);
    }
  }
}
