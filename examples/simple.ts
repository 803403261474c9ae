import { readFile, writeFile } from 'node:fs/promises';
import {
  createHandlers,
  parallel,
  performResult,
  printEffect,
  wrap,
  type Effect,
} from '../src/index';

// === Simple Examples of the Intentful Library ===

// Intents are plain, inert descriptions of what should happen.
class ReadText {
  constructor(readonly path: string) {}
}

class WriteText {
  constructor(readonly path: string, readonly contents: string) {}
}

class Now {
  performEffect(): number {
    return Date.now();
  }
}

// === Example 1: Business logic that only returns effects ===

const stampFile = (path: string): Effect<string, ReadText> =>
  wrap<string, ReadText>(new ReadText(path))
    .onSuccess((contents) =>
      wrap<number>(new Now()).onSuccess((time) => `${contents.trimEnd()}\n-- stamped ${time}\n`))
    .onSuccess((stamped) => wrap<void>(new WriteText(path, stamped)).onSuccess(() => stamped));

// === Example 2: Combining several effects ===

const stampAll = (paths: string[]) =>
  parallel(paths.map(stampFile))
    .onSuccess((results) => results.length)
    .onError((fault) => {
      console.error(`[stamp] failed: ${fault.message}`);
      return 0;
    });

// === Example 3: Performing at the edge ===

const handlers = createHandlers({ logger: console })
  .with(ReadText, (intent) => readFile(intent.path, 'utf8'))
  .with(WriteText, (intent) => writeFile(intent.path, intent.contents));

async function main() {
  const program = stampAll(process.argv.slice(2));
  console.log(printEffect(program));

  const result = await performResult(program, handlers);
  result.match(
    (count) => console.log(`Stamped ${count} file(s).`),
    (fault) => console.error('Unexpected failure:', fault.error),
  );
}

main().catch((error: unknown) => {
  console.error(error);
  process.exitCode = 1;
});
