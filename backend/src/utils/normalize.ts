const EMAIL_PATTERN = /[A-Z0-9._%+-]+@[A-Z0-9.-]+\.[A-Z]{2,}/i;
const STRICT_EMAIL_PATTERN = /^[a-z0-9._%+-]+@[a-z0-9.-]+\.[a-z]{2,}$/;

/**
 * Pulls the address out of a `Name <addr>` header (or a bare address) and
 * lower-cases it. Returns null when no valid address is present.
 */
export const extractEmailAddress = (raw: string): string | null => {
  const trimmed = raw.trim();
  const angled = trimmed.match(/<([^>]*)>/);
  const candidate = (angled?.[1] ?? trimmed).trim().toLowerCase();
  if (STRICT_EMAIL_PATTERN.test(candidate)) {
    return candidate;
  }
  const embedded = trimmed.match(EMAIL_PATTERN);
  return embedded?.[0]?.toLowerCase() ?? null;
};

export const extractDisplayName = (raw: string): string => {
  const cleaned = raw.trim();
  if (!cleaned) {
    return "";
  }

  const withAngle = cleaned.match(/^(.*?)</);
  if (!withAngle) {
    return "";
  }
  return (withAngle[1] ?? "")
    .trim()
    .replace(/^"+|"+$/g, "")
    .replace(/\s+/g, " ")
    .trim();
};

/** Replaces anything outside word characters, dashes and dots with `_`. */
export const safeFilename = (filename: string): string => {
  const base = filename.split(/[\\/]/).pop() ?? filename;
  const cleaned = base.replace(/[^\w\-.]/g, "_").replace(/^\.+/, "");
  return cleaned || "attachment";
};

/** `name`, or `stem-2.ext`, `stem-3.ext`, ... when `name` is already taken. */
export const uniqueObjectName = (name: string, taken: ReadonlySet<string>): string => {
  if (!taken.has(name)) {
    return name;
  }
  const dot = name.lastIndexOf(".");
  const stem = dot > 0 ? name.slice(0, dot) : name;
  const extension = dot > 0 ? name.slice(dot) : "";
  for (let suffix = 2; ; suffix += 1) {
    const candidate = `${stem}-${suffix}${extension}`;
    if (!taken.has(candidate)) {
      return candidate;
    }
  }
};

export const fileExtension = (filename: string): string => {
  const dot = filename.lastIndexOf(".");
  if (dot <= 0 || dot === filename.length - 1) {
    return "";
  }
  return filename.slice(dot + 1).toLowerCase();
};

const REPLY_PREFIXES = [/^re:\s*/i, /^fw:\s*/i, /^fwd:\s*/i];

export const stripReplyPrefixes = (subject: string): string => {
  let normalized = subject.trim();
  let changed = true;
  while (changed) {
    changed = false;
    for (const prefix of REPLY_PREFIXES) {
      const next = normalized.replace(prefix, "");
      if (next !== normalized) {
        normalized = next;
        changed = true;
      }
    }
  }
  return normalized;
};
