/**
 * Feed assembly
 * Maps the final, ordered entry list onto RSS 2.0 channel and item fields and
 * writes the document to disk in one step.
 */

import { promises as fs } from 'fs';
import path from 'path';
import { XMLBuilder } from 'fast-xml-parser';
import type { FeedConfig } from '../config/environment';
import type { Entry } from '../types/entry';
import { logger } from '../utils/logger';

export const ELLIPSIS = '...';
export const GENERATOR = 'press-briefings-rss';
export const ATOM_NAMESPACE = 'http://www.w3.org/2005/Atom';

export type ChannelMetadata = Pick<
  FeedConfig,
  'title' | 'description' | 'language' | 'link' | 'selfUrl' | 'imageUrl' | 'itemDescriptionPrefix' | 'maxBodyLength'
>;

const builder = new XMLBuilder({
  ignoreAttributes: false,
  attributeNamePrefix: '@_',
  format: true,
  indentBy: '  ',
  suppressEmptyNode: true,
  suppressBooleanAttributes: false
});

// Control characters, U+FFFE/U+FFFF and unpaired surrogates are not allowed in XML 1.0
const XML_INVALID_CHARS =
  /[\u0000-\u0008\u000B\u000C\u000E-\u001F\uFFFE\uFFFF]|[\uD800-\uDBFF](?![\uDC00-\uDFFF])|(?<![\uD800-\uDBFF])[\uDC00-\uDFFF]/g;

export function stripInvalidXmlChars(text: string): string {
  return text.replace(XML_INVALID_CHARS, '');
}

/** Cuts on code points so a surrogate pair is never split. */
export function truncateBody(text: string, maxLength: number): string {
  if (text.length <= maxLength) {
    return text;
  }
  const codePoints = Array.from(text);
  if (codePoints.length <= maxLength) {
    return text;
  }
  return codePoints.slice(0, maxLength).join('') + ELLIPSIS;
}

/** Item description: the truncated body when there is one, else a line naming the title. */
export function describeEntry(entry: Entry, channel: ChannelMetadata): string {
  const body = stripInvalidXmlChars(entry.body ?? '').trim();
  if (body) {
    return truncateBody(body, channel.maxBodyLength);
  }
  return `${channel.itemDescriptionPrefix}: ${stripInvalidXmlChars(entry.title)}`;
}

// RFC 822 date as RSS 2.0 expects, always in GMT
function toRfc822(date: Date): string {
  return date.toUTCString();
}

function buildItem(entry: Entry, channel: ChannelMetadata) {
  return {
    title: stripInvalidXmlChars(entry.title),
    link: entry.url,
    guid: {
      '#text': entry.url,
      '@_isPermaLink': 'true'
    },
    pubDate: toRfc822(entry.published_at),
    description: describeEntry(entry, channel)
  };
}

/**
 * Serialize entries to an RSS 2.0 document. Entries are written in the order given;
 * the pipeline sorts them newest first before calling this.
 */
export function buildFeed(
  entries: readonly Entry[],
  channel: ChannelMetadata,
  now: () => Date = () => new Date()
): string {
  const image = channel.imageUrl
    ? { image: { url: channel.imageUrl, title: channel.title, link: channel.link } }
    : {};

  const document = {
    '?xml': { '@_version': '1.0', '@_encoding': 'UTF-8' },
    rss: {
      '@_version': '2.0',
      '@_xmlns:atom': ATOM_NAMESPACE,
      channel: {
        title: channel.title,
        link: channel.link,
        description: channel.description,
        'atom:link': {
          '@_href': channel.selfUrl,
          '@_rel': 'self',
          '@_type': 'application/rss+xml'
        },
        language: channel.language,
        lastBuildDate: toRfc822(now()),
        generator: GENERATOR,
        ...image,
        item: entries.map(entry => buildItem(entry, channel))
      }
    }
  };

  return builder.build(document);
}

/**
 * Write the feed through a temporary sibling file and a rename, so readers never
 * see a partially written document.
 */
export async function writeFeedFile(xml: string, outputPath: string): Promise<string> {
  const target = path.resolve(outputPath);
  const temporary = `${target}.${process.pid}.tmp`;

  await fs.mkdir(path.dirname(target), { recursive: true });
  try {
    await fs.writeFile(temporary, xml, 'utf8');
    await fs.rename(temporary, target);
  } catch (error) {
    await fs.rm(temporary, { force: true });
    throw error;
  }

  logger.info(`RSS feed written to: ${target}`);
  return target;
}
