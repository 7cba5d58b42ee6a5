const MAX_LENGTH = 80;

/**
 * Filesystem-safe slug of an article title, at most 80 chars.
 * Accents are folded ("Café" → "cafe"); anything else outside [a-z0-9] becomes a separator.
 * Returns "" when nothing survives so the caller picks the fallback.
 */
export function slugify(title: string): string {
  const slug = title
    .normalize("NFKD")
    .replace(/[\u0300-\u036f]/g, "")
    .toLowerCase()
    .replace(/['’]/g, "")
    .replace(/[^a-z0-9]+/g, "-")
    .replace(/^-+|-+$/g, "");

  return slug.length > MAX_LENGTH ? slug.slice(0, MAX_LENGTH).replace(/-+$/, "") : slug;
}
