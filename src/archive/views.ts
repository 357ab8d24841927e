import type { AcceptedPayload, ForumPost, PayloadFormat } from '../transport/adapter.js';
import { truncate } from '../shared/utils.js';

/**
 * A derived, human-oriented rendering of an accepted payload. `suffix` is
 * appended to the archive stem, e.g. `_readable.txt`.
 */
export interface DerivedView {
  suffix: string;
  formats: readonly PayloadFormat[];
  render(payload: AcceptedPayload, date: string): string;
}

const RULE = '='.repeat(70);
const THIN_RULE = '-'.repeat(70);

const STRATEGY_LABELS: Record<string, string> = {
  oauth: 'Reddit API (OAuth)',
  feed: 'RSS feed',
  hybrid: 'RSS feed + per-post JSON',
  json: 'Public JSON endpoint',
};

function byScore(posts: ForumPost[]): ForumPost[] {
  return [...posts].sort((a, b) => (b.score ?? 0) - (a.score ?? 0));
}

function postedDate(createdUtc: number | undefined): string {
  if (!createdUtc) return 'unknown';
  return new Date(createdUtc * 1000).toISOString().replace('T', ' ').slice(0, 19) + ' UTC';
}

export const processedView: DerivedView = {
  suffix: '_processed.json',
  formats: ['listing'],
  render(payload) {
    return JSON.stringify(payload.posts, null, 2) + '\n';
  },
};

export const readableView: DerivedView = {
  suffix: '_readable.txt',
  formats: ['listing', 'feed'],
  render(payload, date) {
    const lines: string[] = [
      `Reddit r/${payload.forum} - ${date}`,
      RULE,
      `Source: ${STRATEGY_LABELS[payload.strategy] ?? payload.strategy}`,
      `Posts: ${payload.posts.length}`,
      RULE,
      '',
    ];

    for (const post of payload.posts) {
      lines.push(RULE, `POST #${post.rank}: ${post.title}`, RULE, `Author: u/${post.author}`);
      if (post.score !== undefined) {
        const ratio =
          post.upvoteRatio !== undefined ? ` | Upvote Ratio: ${(post.upvoteRatio * 100).toFixed(1)}%` : '';
        lines.push(`Score: ${post.score} | Comments: ${post.numComments ?? 0}${ratio}`);
      }
      lines.push(`Posted: ${postedDate(post.createdUtc)}`, `Link: ${post.permalink}`);
      if (post.url && post.url !== post.permalink) {
        lines.push(`URL: ${post.url}`);
      }
      lines.push('', 'CONTENT:', post.content || '(no content)', '');
    }

    return lines.join('\n');
  },
};

export const summaryView: DerivedView = {
  suffix: '_SUMMARY.txt',
  formats: ['listing'],
  render(payload, date) {
    const lines: string[] = [
      `r/${payload.forum} - ${date}`,
      RULE,
      'SORTED BY POPULARITY (Most upvoted first)',
      `Total posts: ${payload.posts.length}`,
      RULE,
      '',
    ];

    byScore(payload.posts).forEach((post, i) => {
      lines.push(
        THIN_RULE,
        `#${i + 1} | ${String(post.score ?? 0).padStart(4)} upvotes | ` +
          `${String(post.numComments ?? 0).padStart(3)} comments | u/${post.author}`,
        THIN_RULE,
        post.title,
        post.permalink,
      );
      if (post.isSelf && post.content) {
        lines.push('', truncate(post.content, 200));
      }
      lines.push('');
    });

    return lines.join('\n');
  },
};

export const top10View: DerivedView = {
  suffix: '_TOP10.txt',
  formats: ['listing'],
  render(payload, date) {
    const lines: string[] = [`r/${payload.forum} - TOP 10 MOST POPULAR - ${date}`, RULE, ''];

    byScore(payload.posts)
      .slice(0, 10)
      .forEach((post, i) => {
        const rank = String(i + 1).padStart(2);
        const score = String(post.score ?? 0).padStart(4);
        const comments = String(post.numComments ?? 0).padStart(3);
        lines.push(`${rank}. ^${score} c${comments} | ${post.title.slice(0, 60)}`, `    ${post.permalink}`, '');
      });

    return lines.join('\n');
  },
};

export const titlesView: DerivedView = {
  suffix: '_titles.txt',
  formats: ['feed'],
  render(payload) {
    return payload.posts.map((post) => post.title).join('\n') + '\n';
  },
};

export const DEFAULT_VIEWS: readonly DerivedView[] = [
  processedView,
  readableView,
  summaryView,
  top10View,
  titlesView,
];

export function viewsFor(format: PayloadFormat, views: readonly DerivedView[] = DEFAULT_VIEWS): DerivedView[] {
  return views.filter((view) => view.formats.includes(format));
}
