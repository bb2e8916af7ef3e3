#!/usr/bin/env node
// UMP CLI — inspect and decode UMP response bodies from the command line.
//
//   tsx src/cli.ts parts body.ump [--continuation segmented] [--out parts.ndjson]
//   tsx src/cli.ts decode seg1.ump seg2.ump --out ./dump --key <64 hex> [--lenient]
//   tsx src/cli.ts seal --key <64 hex> --in request.bin --out sealed.json [--gzip]
//
// Every input file is fed as one buffer, split further with --chunk-size.
//
//   parts   one NDJSON line per framed part: { type, name, length }
//   decode  events.ndjson (one line per event) + media<headerId>.bin per media stream
//   seal    { ciphertext, iv, hmac } as base64 JSON

import { command, subcommands, run, string, number, option, optional, flag, restPositionals, extendType } from "cmd-ts";
import { promises as fs } from "node:fs";
import { join } from "node:path";
import { fromHex, toBase64 } from "./bytes.js";
import { parseContinuationMode } from "./config.js";
import { ensureModuleLogger } from "./logger.js";
import { partTypeName } from "./part.js";
import { seal } from "./onesie/envelope.js";
import { UmpReader, collectMedia, partFramer, type UmpEvt } from "./reader/index.js";

const logger = ensureModuleLogger("cli");

// ── argument types ────────────────────────────────────────────────────────────

const ContinuationArg = extendType(string, {
  displayName: "stream|segmented",
  from: async (s) => parseContinuationMode(s),
});

const HexKeyArg = extendType(string, {
  displayName: "hex",
  from: async (s) => fromHex(s),
});

const inputArgs = {
  files: restPositionals({
    type: string,
    displayName: "files",
    description: "UMP body files, fed in order",
  }),
  continuation: option({
    type: ContinuationArg,
    long: "continuation",
    description: "How a part continues across input buffers (default: stream)",
    defaultValue: () => "stream" as const,
  }),
  chunkSize: option({
    type: optional(number),
    long: "chunk-size",
    description: "Split every file into buffers of this many bytes",
  }),
};

// ── helpers ───────────────────────────────────────────────────────────────────

async function inputStream(files: string[], chunkSize: number | undefined): Promise<ReadableStream<Uint8Array>> {
  if (!files.length) throw new Error("at least one input file required");
  if (chunkSize !== undefined && !(Number.isInteger(chunkSize) && chunkSize > 0)) {
    throw new Error(`--chunk-size must be a positive integer, got ${chunkSize}`);
  }
  const chunks: Uint8Array[] = [];
  for (const file of files) {
    const buf = new Uint8Array(await fs.readFile(file));
    const size = chunkSize ?? Math.max(buf.byteLength, 1);
    for (let i = 0; i < buf.byteLength; i += size) chunks.push(buf.subarray(i, i + size));
    logger.Debug().Str("file", file).Uint64("bytes", buf.byteLength).Msg("loaded");
  }
  return new ReadableStream<Uint8Array>({
    start(ctrl): void {
      for (const c of chunks) ctrl.enqueue(c);
      ctrl.close();
    },
  });
}

// Byte payloads are summarised by their length; live streams are left out.
function evtJson(evt: UmpEvt): string {
  return JSON.stringify(evt, (_key, value: unknown) => {
    if (value instanceof Uint8Array) return { byteLength: value.byteLength };
    if (value instanceof ReadableStream) return undefined;
    if (value instanceof Error) return { ...value, message: value.message };
    return value;
  });
}

// ── parts command ─────────────────────────────────────────────────────────────

const partsCmd = command({
  name: "parts",
  description: "List the parts of a UMP body",
  args: {
    ...inputArgs,
    out: option({
      type: optional(string),
      long: "out",
      short: "o",
      description: "Output NDJSON file (default: stdout)",
    }),
  },
  handler: async ({ files, continuation, chunkSize, out }): Promise<void> => {
    const input = await inputStream(files, chunkSize);
    const reader = input.pipeThrough(partFramer({ continuation, logger })).getReader();
    const lines: string[] = [];
    while (true) {
      const { done, value } = await reader.read();
      if (done) break;
      lines.push(JSON.stringify({ type: value.type, name: partTypeName(value.type), length: value.payload.byteLength }));
    }
    const text = lines.map((l) => l + "\n").join("");
    if (out) {
      await fs.writeFile(out, text);
      logger.Info().Uint64("parts", lines.length).Str("out", out).Msg("wrote");
    } else {
      process.stdout.write(text);
    }
  },
});

// ── decode command ────────────────────────────────────────────────────────────

const decodeCmd = command({
  name: "decode",
  description: "Decode a UMP body into events and media files",
  args: {
    ...inputArgs,
    out: option({
      type: string,
      long: "out",
      short: "o",
      description: "Output directory",
    }),
    key: option({
      type: optional(HexKeyArg),
      long: "key",
      description: "Onesie key: 32 bytes as hex (AES key then HMAC key)",
    }),
    lenient: flag({
      long: "lenient",
      description: "Log protocol violations instead of failing",
    }),
  },
  handler: async ({ files, continuation, chunkSize, out, key, lenient }): Promise<void> => {
    await fs.mkdir(out, { recursive: true });
    const input = await inputStream(files, chunkSize);
    const [events, media] = UmpReader(input, {
      continuation,
      strict: !lenient,
      logger,
      ...(key ? { onesieKey: key } : {}),
    }).tee();

    const writeEvents = async (): Promise<number> => {
      const lines: string[] = [];
      const reader = events.getReader();
      while (true) {
        const { done, value } = await reader.read();
        if (done) break;
        lines.push(evtJson(value));
      }
      await fs.writeFile(join(out, "events.ndjson"), lines.map((l) => l + "\n").join(""));
      return lines.length;
    };

    const writeMedia = async (): Promise<number> => {
      let count = 0;
      const reader = collectMedia(media).getReader();
      while (true) {
        const { done, value } = await reader.read();
        if (done) break;
        const path = join(out, `media${value.headerId}.bin`);
        await fs.writeFile(path, value.bytes);
        logger
          .Info()
          .Uint64("headerId", value.headerId)
          .Uint64("bytes", value.bytes.byteLength)
          .Bool("complete", value.complete)
          .Msg(`wrote ${path}`);
        count++;
      }
      return count;
    };

    const [eventCount, mediaCount] = await Promise.all([writeEvents(), writeMedia()]);
    logger.Info().Uint64("events", eventCount).Uint64("media", mediaCount).Str("out", out).Msg("decoded");
  },
});

// ── seal command ──────────────────────────────────────────────────────────────

const sealCmd = command({
  name: "seal",
  description: "Seal a request body into an onesie envelope",
  args: {
    key: option({
      type: HexKeyArg,
      long: "key",
      description: "Onesie key: 32 bytes as hex (AES key then HMAC key)",
    }),
    in: option({
      type: string,
      long: "in",
      short: "i",
      description: "Plaintext input file",
    }),
    out: option({
      type: string,
      long: "out",
      short: "o",
      description: "Output JSON file",
    }),
    gzip: flag({
      long: "gzip",
      description: "gzip the plaintext before sealing",
    }),
  },
  handler: async ({ key, in: inFile, out, gzip }): Promise<void> => {
    const plaintext = new Uint8Array(await fs.readFile(inFile));
    const sealed = await seal(key, plaintext, { compress: gzip });
    await fs.writeFile(
      out,
      JSON.stringify({ ciphertext: toBase64(sealed.ciphertext), iv: toBase64(sealed.iv), hmac: toBase64(sealed.hmac) }, null, 2),
    );
    logger.Info().Uint64("bytes", sealed.ciphertext.byteLength).Str("out", out).Msg("sealed");
  },
});

// ── main ──────────────────────────────────────────────────────────────────────

const app = subcommands({
  name: "ump",
  description: "UMP CLI — frame, decode and seal UMP streaming payloads",
  cmds: { parts: partsCmd, decode: decodeCmd, seal: sealCmd },
});

run(app, process.argv.slice(2)).catch((e: unknown) => {
  logger.Error().Err(e).Msg("failed");
  process.exitCode = 1;
});
