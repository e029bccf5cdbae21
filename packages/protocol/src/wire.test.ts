import { describe, it, expect } from "vitest";
import { encodeFields, decodeFields, decodePairs, decodeBeacon, toWellFormed } from "./wire.js";

describe("encodeFields", () => {
  it("joins key=value pairs with ampersands", () => {
    expect(encodeFields([["et", 1], ["na", "home"], ["s0", 4]])).toBe("et=1&na=home&s0=4");
  });

  it("leaves out absent values but keeps empty strings", () => {
    expect(encodeFields([["et", 60], ["na", null], ["rs", undefined], ["st", ""]])).toBe(
      "et=60&st=",
    );
  });

  it("percent-encodes delimiters and non-ASCII text", () => {
    expect(encodeFields([["na", "a&b=c ü"]])).toBe("na=a%26b%3Dc%20%C3%BC");
  });

  it("replaces unpaired surrogates with U+FFFD", () => {
    expect(encodeFields([["na", "user\uD83D"], ["rs", "\uDE00x"]])).toBe(
      "na=user%EF%BF%BD&rs=%EF%BF%BDx",
    );
  });

  it("keeps complete surrogate pairs", () => {
    expect(encodeFields([["na", "\uD83D\uDE00"]])).toBe("na=%F0%9F%98%80");
  });
});

describe("toWellFormed", () => {
  it("leaves well-formed text alone", () => {
    expect(toWellFormed("plain ü \uD83D\uDE00")).toBe("plain ü \uD83D\uDE00");
  });

  it("replaces every unpaired half", () => {
    expect(toWellFormed("\uDE00\uD83D")).toBe("\uFFFD\uFFFD");
  });
});

describe("decodePairs", () => {
  it("keeps order and decodes values", () => {
    expect(decodePairs("et=1&na=a%26b&flag")).toEqual([
      ["et", "1"],
      ["na", "a&b"],
      ["flag", ""],
    ]);
  });

  it("returns nothing for an empty line", () => {
    expect(decodePairs("")).toEqual([]);
  });

  it("throws on malformed percent-encoding", () => {
    expect(() => decodeFields("na=%E0%A4%A")).toThrow(URIError);
  });
});

describe("decodeBeacon", () => {
  it("splits the prefix from records at each event type key", () => {
    const beacon = decodeBeacon("vv=3&sn=7&et=60&na=bob&et=19&s0=2");

    expect(Object.fromEntries(beacon.prefix)).toEqual({ vv: "3", sn: "7" });
    expect(beacon.records.map((r) => Object.fromEntries(r))).toEqual([
      { et: "60", na: "bob" },
      { et: "19", s0: "2" },
    ]);
  });
});
