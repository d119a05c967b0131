import * as z from 'zod';

/**
 * Navigation entries as they appear in a site configuration: page paths,
 * titled sections and nested lists of both.
 */
export type NavEntry = string | NavEntry[] | { [title: string]: NavEntry };

export const navEntrySchema: z.ZodType<NavEntry> = z.lazy(() =>
  z.union([z.string(), z.array(navEntrySchema), z.record(z.string(), navEntrySchema)])
);

const QMD_EXTENSION = '.qmd';

/**
 * Point navigation entries at converted pages: every path ending in `.qmd`
 * ends in `.md` instead. Other values are returned unchanged.
 */
export function convertNav(nav: NavEntry): NavEntry {
  if (typeof nav === 'string') {
    return nav.endsWith(QMD_EXTENSION) ? `${nav.slice(0, -QMD_EXTENSION.length)}.md` : nav;
  }
  if (Array.isArray(nav)) return nav.map((entry) => convertNav(entry));

  const out: { [title: string]: NavEntry } = {};
  for (const [title, entry] of Object.entries(nav)) {
    out[title] = convertNav(entry);
  }
  return out;
}
