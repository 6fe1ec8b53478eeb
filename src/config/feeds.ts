/**
 * Default feed lists for the RSS and Reddit adapters
 */

export const DEFAULT_RSS_FEEDS: readonly string[] = [
  // News desks
  "https://techcrunch.com/category/artificial-intelligence/feed/",
  "https://www.theverge.com/rss/artificial-intelligence/index.xml",
  "https://www.wired.com/feed/category/ai/latest/rss",
  "https://venturebeat.com/category/ai/feed/",
  "https://www.technologyreview.com/topic/artificial-intelligence/feed",

  // Lab and vendor blogs
  "https://openai.com/blog/rss.xml",
  "https://www.anthropic.com/index.xml",
  "https://deepmind.google/blog/rss.xml",
  "https://aws.amazon.com/blogs/machine-learning/feed/",
];

export const DEFAULT_SUBREDDIT_FEEDS: readonly string[] = [
  "https://www.reddit.com/r/MachineLearning/.rss",
  "https://www.reddit.com/r/LocalLLaMA/.rss",
];

/**
 * Reddit serves an interstitial page to unknown clients
 */
export const REDDIT_USER_AGENT =
  "Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0 Safari/537.36";

export const RSS_LOOKBACK_HOURS = 168;
