import { describe, expect, it } from "vitest";
import {
  pageCount,
  pageNumbers,
  pageQuery,
  POSTS_PER_PAGE,
  tagQuery,
} from "./pagination";

describe("pageCount", () => {
  it("rounds partial pages up", () => {
    expect(POSTS_PER_PAGE).toBe(20);
    expect(pageCount(0)).toBe(0);
    expect(pageCount(1)).toBe(1);
    expect(pageCount(20)).toBe(1);
    expect(pageCount(21)).toBe(2);
    expect(pageCount(45)).toBe(3);
  });
});

describe("pageNumbers", () => {
  it("yields 1..pages without gaps or repeats", () => {
    for (const total of [0, 1, 19, 20, 21, 40, 45, 399, 400, 401]) {
      const pages = [...pageNumbers(total)];
      expect(pages).toEqual(
        Array.from({ length: Math.ceil(total / 20) }, (_, i) => i + 1),
      );
    }
  });

  it("honours a custom page size", () => {
    expect([...pageNumbers(10, 3)]).toEqual([1, 2, 3, 4]);
  });
});

describe("queries", () => {
  it("joins tags with an encoded space", () => {
    expect(tagQuery(["foo", "bar"])).toBe("tags=foo+bar");
  });

  it("encodes reserved characters in tags", () => {
    expect(tagQuery(["rating:safe", "a&b"])).toBe("tags=rating%3Asafe+a%26b");
  });

  it("adds page and limit", () => {
    expect(pageQuery(["foo", "bar"], 2)).toBe("tags=foo+bar&page=2&limit=20");
  });
});
