export class HttpError extends Error {
  constructor(
    readonly status: number,
    readonly reason: string,
  ) {
    super(`${status} ${reason}`);
    this.name = "HttpError";
  }
}

export class MissingFileUrlError extends Error {
  constructor(readonly postId: number) {
    super(`no file URL for post ${postId}`);
    this.name = "MissingFileUrlError";
  }
}

export class MalformedResponseError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "MalformedResponseError";
  }
}
