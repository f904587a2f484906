/**
 * A blog platform whose posts are authored in a structured block editor.
 */
export interface BlogPlatformRule {
  name: string;
  /** Desktop host every request is made against. */
  canonicalHost: string;
  /** Mobile host rewritten to `canonicalHost` before any processing. */
  mobileHost?: string;
  /** First-party media hosts; only images on these hosts go to the image resolver. */
  mediaHosts: string[];
  /** Frame holding the actual post when the canonical page is only a shell. */
  frameSelector?: string;
  /** Suffix the platform appends to page titles. */
  titleSuffixPattern?: RegExp;
  /** Platform notices that never belong to a post body. */
  boilerplatePatterns: RegExp[];
}

/** Rewrites thumbnail-sized media URLs to a larger rendition. */
export interface SizeRewriteRule {
  hostSuffixes: string[];
  param: string;
  value: string;
}

export const NAVER_BLOG: BlogPlatformRule = {
  name: 'naver-blog',
  canonicalHost: 'blog.naver.com',
  mobileHost: 'm.blog.naver.com',
  mediaHosts: [
    'blogfiles.naver.net',
    'postfiles.naver.net',
    'blogpfthumb.pstatic.net',
    'ssl.pstatic.net',
    'postfiles.pstatic.net',
  ],
  frameSelector: 'iframe#mainFrame',
  titleSuffixPattern: /\s*:\s*네이버.*$/,
  boilerplatePatterns: [
    /저작권 침해가 우려되는/i,
    /글보내기 기능을 제한합니다/i,
    /네이버는 블로그를 통해/i,
    /저작물이 무단으로 공유되는 것을 막기 위해/i,
    /저작권을 침해하는 컨텐츠가 포함되어 있는/i,
    /상세한 안내를 받고 싶으신 경우/i,
    /네이버 고객센터로 문의주시면/i,
    /건강한 인터넷 환경을 만들어 나갈 수 있도록/i,
    /고객님의 많은 관심과 협조를 부탁드립니다/i,
    /메뉴 바로가기/i,
    /본문 바로가기/i,
    /작성하신.*이용자들의 신고가 많은 표현이 포함/i,
    /다른 표현을 사용해주시기 바랍니다/i,
    /건전한 인터넷 문화 조성을 위해/i,
    /회원님의 적극적인 협조를 부탁드립니다/i,
    /더 궁금하신 사항은 고객센터로 문의하시면/i,
    /^## 블로그$/i,
    /^댓글\d+$/i,
  ],
};

export const DEFAULT_BLOG_PLATFORMS: readonly BlogPlatformRule[] = [NAVER_BLOG];

export const GENERIC_BOILERPLATE_PATTERNS: readonly RegExp[] = [
  /copyright notice/i,
  /^skip to (main )?content$/i,
  /^(accept|reject) (all )?cookies$/i,
  /this site uses cookies/i,
  /^share (this|on)\b.{0,30}$/i,
  /^advertisement$/i,
];

export const DEFAULT_BOILERPLATE_PATTERNS: readonly RegExp[] = [
  ...GENERIC_BOILERPLATE_PATTERNS,
  ...DEFAULT_BLOG_PLATFORMS.flatMap(platform => platform.boilerplatePatterns),
];

export const DEFAULT_SIZE_REWRITES: readonly SizeRewriteRule[] = [
  { hostSuffixes: ['pstatic.net', 'naver.com', 'naver.net'], param: 'type', value: 'w966' },
];

export function hostMatches(hostname: string, host: string): boolean {
  const lower = hostname.toLowerCase();
  return lower === host || lower.endsWith(`.${host}`);
}
