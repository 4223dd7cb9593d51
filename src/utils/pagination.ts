export const POSTS_PER_PAGE = 20;

export const pageCount = (total: number, pageSize = POSTS_PER_PAGE): number =>
  Math.ceil(total / pageSize);

export function* pageNumbers(
  total: number,
  pageSize = POSTS_PER_PAGE,
): Generator<number> {
  const pages = pageCount(total, pageSize);
  for (let page = 1; page <= pages; page++) yield page;
}

// The API ANDs space separated tags; form encoding turns the spaces into "+".
export const tagQuery = (tags: string[]): string =>
  new URLSearchParams({ tags: tags.join(" ") }).toString();

export const pageQuery = (
  tags: string[],
  page: number,
  limit = POSTS_PER_PAGE,
): string =>
  new URLSearchParams({
    tags: tags.join(" "),
    page: String(page),
    limit: String(limit),
  }).toString();
