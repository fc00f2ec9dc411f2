import { describe, expect, it } from "vitest";
import { extractUsername } from "../src/utils/username.js";

describe("extractUsername", () => {
  it.each([
    ["spez", "spez"],
    ["  spez  ", "spez"],
    ["u/spez", "spez"],
    ["/u/spez", "spez"],
    ["https://www.reddit.com/user/spez/", "spez"],
    ["https://reddit.com/u/Some_User-1", "Some_User-1"],
    ["https://old.reddit.com/user/spez/comments/", "spez"],
  ])("reads %s as %s", (input, expected) => {
    expect(extractUsername(input)).toBe(expected);
  });

  it.each([
    "",
    "ab",
    "https://example.com/user/spez",
    "https://www.reddit.com/r/typescript",
    "name with spaces",
    "a".repeat(21),
  ])("rejects %j", (input) => {
    expect(extractUsername(input)).toBeNull();
  });
});
