import { describe, it, expect } from "vitest";
import { isMediaBegin, isMediaEnd, isOnesieEvt, isUmpPart, type UmpEvt } from "./events.js";

const begin: UmpEvt = { type: "media.begin", headerId: 1, header: { headerId: 1 }, stream: new ReadableStream() };
const end: UmpEvt = { type: "media.end", headerId: 1, byteLength: 0, complete: true };
const onesie: UmpEvt = { type: "onesie.header", header: { type: 0 } };
const part: UmpEvt = { type: "ump.part", partType: 99, name: "UNKNOWN_99", payload: new Uint8Array(0) };

describe("event guards", () => {
  it("tell the event kinds apart", () => {
    const all = [begin, end, onesie, part];
    expect(all.map(isMediaBegin)).toEqual([true, false, false, false]);
    expect(all.map(isMediaEnd)).toEqual([false, true, false, false]);
    expect(all.map(isOnesieEvt)).toEqual([false, false, true, false]);
    expect(all.map(isUmpPart)).toEqual([false, false, false, true]);
  });

  it("reject values that are not events", () => {
    for (const v of [undefined, null, 3, "media.begin", { type: "media.begin" }]) {
      expect(isMediaBegin(v)).toBe(false);
    }
  });
});
