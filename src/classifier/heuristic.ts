import type { KeywordExtractor } from "./keywords.js";

const MAX_FALLBACK_KEYWORDS = 3;

// Ordered by how well each family separates otherwise identical postings.
const FALLBACK_PATTERNS: RegExp[] = [
  // team / department of a company or cloud unit
  /([一-龥a-zA-Z]+(?:云|端|科技|技术)[一-龥a-zA-Z]*(?:团队|实验室|部门|事业部|BG))/gi,
  /(微信|QQ|抖音|头条|淘宝|钉钉|支付宝|百度|搜索)/gi,
  /(HarmonyOS|TikTok|WeChat|ChatGPT|Claude)/gi,
  // business line
  /([一-龥]*(?:推荐|搜索|广告|支付|风控)[一-龥]*(?:系统|平台|算法|团队))/gi,
  /(大模型|机器学习|深度学习|计算机视觉|自然语言处理|语音识别)/gi,
];

export function extractKeywordsHeuristically(text: string): string[] {
  const found: string[] = [];
  for (const pattern of FALLBACK_PATTERNS) {
    for (const match of text.matchAll(pattern)) {
      found.push(match[1]);
    }
  }
  return [...new Set(found)].slice(0, MAX_FALLBACK_KEYWORDS);
}

/** Local-only extractor, used when no API key is configured. */
export class HeuristicKeywordExtractor implements KeywordExtractor {
  async extract(text: string): Promise<string[]> {
    return extractKeywordsHeuristically(text);
  }
}
