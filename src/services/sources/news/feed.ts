import { z } from "zod";
import { parseStringPromise } from "xml2js";
import { Result, success, failure } from "@core/types";
import { FetchError } from "@core/errors/FetchError";
import { toError } from "@utils/typeGuards";

/**
 * Text node as xml2js returns it: a string, or an object with the text
 * under "_" when the element has attributes
 */
const textSchema = z.union([
  z.string(),
  z.object({ _: z.string() }).transform((node) => node._),
  z.object({ $: z.record(z.string()) }).transform(() => ""),
]);

const rssSchema = z.object({
  rss: z.object({
    channel: z
      .array(
        z.object({
          item: z
            .array(
              z.object({
                title: z.array(textSchema).optional(),
                link: z.array(textSchema).optional(),
                guid: z.array(textSchema).optional(),
              }),
            )
            .default([]),
        }),
      )
      .min(1),
  }),
});

const atomSchema = z.object({
  feed: z.object({
    entry: z
      .array(
        z.object({
          title: z.array(textSchema).optional(),
          id: z.array(textSchema).optional(),
          link: z
            .array(z.object({ $: z.object({ href: z.string() }) }))
            .optional(),
        }),
      )
      .default([]),
  }),
});

export type FeedItem = {
  title: string;
  link: string | null;
};

/**
 * Collapse whitespace the feed may carry inside titles
 */
function cleanText(text: string | undefined): string {
  return (text ?? "").replace(/\s+/g, " ").trim();
}

/**
 * Items of an RSS 2.0 or Atom document, in feed order, without
 * untitled entries
 */
export async function parseFeed(
  source: string,
  xml: string,
): Promise<Result<FeedItem[], FetchError>> {
  let document: unknown;
  try {
    document = await parseStringPromise(xml);
  } catch (error) {
    return failure(FetchError.parseError(source, `invalid XML: ${toError(error).message}`));
  }

  const rss = rssSchema.safeParse(document);
  if (rss.success) {
    const items = rss.data.rss.channel[0].item.map((item) => ({
      title: cleanText(item.title?.[0]),
      link: cleanText(item.link?.[0] ?? item.guid?.[0]) || null,
    }));
    return success(items.filter((item) => item.title.length > 0));
  }

  const atom = atomSchema.safeParse(document);
  if (atom.success) {
    const items = atom.data.feed.entry.map((entry) => ({
      title: cleanText(entry.title?.[0]),
      link: cleanText(entry.link?.[0]?.$.href ?? entry.id?.[0]) || null,
    }));
    return success(items.filter((item) => item.title.length > 0));
  }

  return failure(FetchError.parseError(source, "not an RSS or Atom feed"));
}
