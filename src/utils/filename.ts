import { MalformedResponseError } from "../errors";
import { Post } from "../types/danbooru";

export type FilenameStrategy = (post: Post, index: number) => string;

export const padNumber = (n: number, width: number): string =>
  String(n).padStart(width, "0");

export const md5Filename: FilenameStrategy = (post) => {
  if (!post.md5) throw new MalformedResponseError(`no MD5 for post ${post.id}`);
  return `${post.md5}.${post.file_ext}`;
};

/**
 * Names files by their position in the pool. Indices are zero-based, so the
 * width only has to fit `poolSize - 1`.
 */
export const sequenceFilename = (poolSize: number): FilenameStrategy => {
  const width = String(Math.max(poolSize - 1, 0)).length;
  return (post, index) => `${padNumber(index, width)}.${post.file_ext}`;
};
