// src/state/keys.ts

const PREFIX = "chunkvault:v1";

const key = (suffix: string) => `${PREFIX}:${suffix}`;

const encode = (value: string) => Buffer.from(value, "utf8").toString("base64url");

/**
 * Stable, path-safe id for an (owner, filename) pair. Also used as the
 * lock key and the on-disk directory name.
 */
export function sessionIdOf(owner: string, filename: string): string {
  return `${encode(owner)}.${encode(filename)}`;
}

export function parseSessionId(sessionId: string): { owner: string; filename: string } | null {
  const parts = sessionId.split(".");
  if (parts.length !== 2 || !parts[0] || !parts[1]) return null;
  if (!/^[A-Za-z0-9_-]+$/.test(parts[0]) || !/^[A-Za-z0-9_-]+$/.test(parts[1])) {
    return null;
  }

  return {
    owner: Buffer.from(parts[0], "base64url").toString("utf8"),
    filename: Buffer.from(parts[1], "base64url").toString("utf8"),
  };
}

export const uploadKeys = {
  session: (sessionId: string) => key(`upload:${sessionId}:session`),

  ownerIndex: (owner: string) => key(`owner:${encode(owner)}:uploads`),

  // Every known session; sweeper and reconcile scan this.
  allIndex: () => key("upload:all"),
};
