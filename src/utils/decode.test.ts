import { describe, expect, it } from "vitest";
import { MalformedResponseError, MissingFileUrlError } from "../errors";
import { toDownloadablePost, toPool, toPostCount } from "./decode";

describe("toDownloadablePost", () => {
  it("keeps the fields needed for downloading", () => {
    expect(
      toDownloadablePost(
        {
          id: 5,
          md5: "abc",
          file_ext: "jpg",
          file_url: "/data/abc.jpg",
          rating: "s",
        },
        5,
      ),
    ).toEqual({ id: 5, md5: "abc", file_ext: "jpg", file_url: "/data/abc.jpg" });
  });

  it("fails with MissingFileUrlError when file_url is absent or empty", () => {
    expect(() => toDownloadablePost({ id: 6, file_ext: "png" }, 6)).toThrow(
      MissingFileUrlError,
    );
    expect(() =>
      toDownloadablePost({ id: 6, file_ext: "png", file_url: "" }, 6),
    ).toThrow("no file URL for post 6");
  });

  it("falls back to the requested id", () => {
    expect(
      toDownloadablePost({ file_ext: "png", file_url: "/x.png" }, 9).id,
    ).toBe(9);
  });

  it("rejects entries that are not objects or lack an id", () => {
    expect(() => toDownloadablePost("nope")).toThrow(MalformedResponseError);
    expect(() =>
      toDownloadablePost({ file_ext: "png", file_url: "/x.png" }),
    ).toThrow("post metadata has no id");
  });

  it("treats an empty md5 as missing", () => {
    expect(
      toDownloadablePost({ id: 1, md5: "", file_ext: "png", file_url: "/x" })
        .md5,
    ).toBeUndefined();
  });
});

describe("toPool", () => {
  it("splits space delimited post ids in order", () => {
    expect(toPool({ id: 42, name: "set", post_ids: "30 10 20" }, 42)).toEqual({
      id: 42,
      name: "set",
      postIds: [30, 10, 20],
    });
  });

  it("accepts an empty pool", () => {
    expect(toPool({ id: 1, post_ids: "" }, 1).postIds).toEqual([]);
  });

  it("accepts an array of ids", () => {
    expect(toPool({ id: 1, post_ids: [3, 1, 2] }, 1).postIds).toEqual([3, 1, 2]);
  });

  it("rejects non numeric ids and missing post_ids", () => {
    expect(() => toPool({ id: 1, post_ids: "1 x 3" }, 1)).toThrow(
      "pool 1 lists invalid post id NaN",
    );
    expect(() => toPool({ id: 1 }, 1)).toThrow("pool 1 has no post_ids");
  });
});

describe("toPostCount", () => {
  it("reads the nested count", () => {
    expect(toPostCount({ counts: { posts: 45 } })).toBe(45);
  });

  it("rejects a missing count", () => {
    expect(() => toPostCount({ counts: {} })).toThrow(MalformedResponseError);
    expect(() => toPostCount([])).toThrow(MalformedResponseError);
  });
});
