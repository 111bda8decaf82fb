import { describe, expect, it } from "vitest";
import { toCsv } from "../csv";

describe("toCsv", () => {
  it("quotes cells with separators, quotes and newlines", () => {
    expect(
      toCsv(["name", "note", "amount"], [
        ["Perez, Ana", 'said "hi"', 12.5],
        ["Bruno", "line\nbreak", null],
      ]),
    ).toBe('name,note,amount\r\n"Perez, Ana","said ""hi""",12.5\r\nBruno,"line\nbreak",\r\n');
  });
});
