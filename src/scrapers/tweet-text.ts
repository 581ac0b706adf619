import * as cheerio from "cheerio";

/**
 * Site-wide taglines that show up in <meta name="description"> on archived
 * pages that don't carry the post itself. Matched lower-cased, as substrings.
 */
export const DEFAULT_BOILERPLATE_PHRASES = [
  "from breaking news and entertainment to sports and politics",
  "get the full story with all the live commentary",
  "the latest tweets from",
  "log in to twitter",
  "join the conversation",
  "it's what's happening",
  "something went wrong, but don't fret",
];

const MIN_DESCRIPTION_LENGTH = 20;

export interface ExtractOptions {
  boilerplatePhrases?: string[];
}

export type ExtractionStrategy = (
  $: cheerio.CheerioAPI,
  options: ExtractOptions
) => string | null;

function nonEmpty(value: string | undefined | null): string | null {
  const trimmed = value?.trim();
  return trimmed ? trimmed : null;
}

export const fromOpenGraph: ExtractionStrategy = ($) =>
  nonEmpty($('meta[property="og:description"]').attr("content"));

export const fromTwitterCard: ExtractionStrategy = ($) =>
  nonEmpty(
    $('meta[name="twitter:description"]').attr("content") ||
      $('meta[property="twitter:description"]').attr("content")
  );

export const fromMetaDescription: ExtractionStrategy = ($, options) => {
  const description = nonEmpty($('meta[name="description"]').attr("content"));
  if (!description || description.length <= MIN_DESCRIPTION_LENGTH) return null;

  const phrases = options.boilerplatePhrases ?? DEFAULT_BOILERPLATE_PHRASES;
  const lower = description.toLowerCase();
  if (phrases.some((p) => lower.includes(p.toLowerCase()))) return null;

  return description;
};

// Pre-2017 markup: <p class="tweet-text js-tweet-text">
export const fromLegacyMarkup: ExtractionStrategy = ($) =>
  nonEmpty($(".tweet-text, .js-tweet-text").first().text());

export const fromJsonLd: ExtractionStrategy = ($) => {
  let body: string | null = null;

  $('script[type="application/ld+json"]').each((_, el) => {
    const raw = $(el).html();
    if (!raw) return;

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch {
      return; // malformed JSON-LD is skipped
    }

    const blocks = Array.isArray(parsed) ? parsed : [parsed];
    for (const block of blocks) {
      body = nonEmpty(readArticleBody(block));
      if (body) return false;
    }
  });

  return body;
};

function readArticleBody(block: unknown): string | null {
  if (typeof block !== "object" || block === null || !("articleBody" in block)) {
    return null;
  }
  const { articleBody } = block;
  return typeof articleBody === "string" ? articleBody : null;
}

/** Tried in order; first non-empty result wins. */
export const EXTRACTION_STRATEGIES: ExtractionStrategy[] = [
  fromOpenGraph,
  fromTwitterCard,
  fromMetaDescription,
  fromLegacyMarkup,
  fromJsonLd,
];

/**
 * Recover the post text from an archived page. Markup differs by capture
 * era, so several strategies are tried.
 */
export function extractTweetText(html: string, options: ExtractOptions = {}): string | null {
  const $ = cheerio.load(html);

  for (const strategy of EXTRACTION_STRATEGIES) {
    const text = strategy($, options);
    if (text) return text;
  }
  return null;
}
