export type AuthConfig = {
  secret: string;
  jwtIssuer?: string;
  jwtAudience?: string;
  jwtAllowedAlgorithms: string[];
};
