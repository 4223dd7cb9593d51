import "dotenv/config";

export const envs = {
  DANBOORU_AUTH: process.env.DANBOORU_AUTH || undefined,
  DANBOORU_URL: String(process.env.DANBOORU_URL || "https://danbooru.donmai.us"),
  USER_AGENT: String(process.env.USER_AGENT || "booru-fetch/1.0"),
  REQUEST_TIMEOUT_SECONDS: Number.parseInt(
    process.env.REQUEST_TIMEOUT_SECONDS || "60",
  ),
};
