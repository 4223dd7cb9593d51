import { MalformedResponseError, MissingFileUrlError } from "../errors";
import { DownloadablePost, Pool } from "../types/danbooru";

export const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const isPositiveInteger = (value: unknown): value is number =>
  typeof value === "number" && Number.isInteger(value) && value > 0;

export function toDownloadablePost(
  value: unknown,
  requestedId?: number,
): DownloadablePost {
  if (!isRecord(value))
    throw new MalformedResponseError("post metadata is not an object");

  const id = typeof value.id === "number" ? value.id : requestedId;
  if (id === undefined)
    throw new MalformedResponseError("post metadata has no id");

  const fileUrl = value.file_url;
  if (typeof fileUrl !== "string" || fileUrl === "")
    throw new MissingFileUrlError(id);

  const fileExt = value.file_ext;
  if (typeof fileExt !== "string" || fileExt === "")
    throw new MalformedResponseError(`no file extension for post ${id}`);

  return {
    id,
    md5: typeof value.md5 === "string" && value.md5 ? value.md5 : undefined,
    file_ext: fileExt,
    file_url: fileUrl,
  };
}

export function toPool(value: unknown, requestedId: number): Pool {
  if (!isRecord(value))
    throw new MalformedResponseError(`pool ${requestedId} is not an object`);

  const raw = value.post_ids;
  let postIds: unknown[];
  if (typeof raw === "string") {
    postIds = raw
      .split(" ")
      .filter((part) => part !== "")
      .map(Number);
  } else if (Array.isArray(raw)) {
    postIds = raw;
  } else {
    throw new MalformedResponseError(`pool ${requestedId} has no post_ids`);
  }

  const invalid = postIds.find((postId) => !isPositiveInteger(postId));
  if (invalid !== undefined)
    throw new MalformedResponseError(
      `pool ${requestedId} lists invalid post id ${String(invalid)}`,
    );

  return {
    id: typeof value.id === "number" ? value.id : requestedId,
    name: typeof value.name === "string" ? value.name : undefined,
    postIds: postIds.filter(isPositiveInteger),
  };
}

export function toPostCount(value: unknown): number {
  const posts =
    isRecord(value) && isRecord(value.counts) ? value.counts.posts : undefined;
  if (typeof posts !== "number" || !Number.isFinite(posts) || posts < 0)
    throw new MalformedResponseError("post count missing from counts response");
  return posts;
}
