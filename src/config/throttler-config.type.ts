export type ThrottlerConfig = {
  ttl: number;
  limit: number;
};
