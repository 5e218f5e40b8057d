/**
 * LanguageDetector - Maps a file path to a language hint for the prompt.
 *
 * Purely static: extension first, then a few well-known filenames.
 */

import * as path from 'path';

export type SupportedLanguage =
  | 'python'
  | 'typescript'
  | 'javascript'
  | 'java'
  | 'go'
  | 'rust'
  | 'ruby'
  | 'php'
  | 'csharp'
  | 'cpp'
  | 'c'
  | 'kotlin'
  | 'swift'
  | 'scala'
  | 'lua'
  | 'shell'
  | 'html'
  | 'css'
  | 'sql'
  | 'yaml'
  | 'toml'
  | 'json'
  | 'markdown'
  | 'dockerfile'
  | 'makefile'
  | 'unknown';

const LANGUAGE_EXTENSIONS: Record<SupportedLanguage, string[]> = {
  python: ['.py', '.pyw', '.pyx', '.pxd', '.pxi'],
  typescript: ['.ts', '.tsx', '.mts', '.cts'],
  javascript: ['.js', '.jsx', '.mjs', '.cjs'],
  java: ['.java'],
  go: ['.go'],
  rust: ['.rs'],
  ruby: ['.rb', '.rake', '.gemspec'],
  php: ['.php', '.phtml', '.php5', '.php7'],
  csharp: ['.cs'],
  cpp: ['.cpp', '.cc', '.cxx', '.hpp', '.hxx', '.h++'],
  c: ['.c', '.h'],
  kotlin: ['.kt', '.kts'],
  swift: ['.swift'],
  scala: ['.scala', '.sc'],
  lua: ['.lua'],
  shell: ['.sh', '.bash', '.zsh'],
  html: ['.html', '.htm'],
  css: ['.css', '.scss', '.less'],
  sql: ['.sql'],
  yaml: ['.yml', '.yaml'],
  toml: ['.toml'],
  json: ['.json'],
  markdown: ['.md', '.markdown'],
  dockerfile: [],
  makefile: ['.mk'],
  unknown: [],
};

const SPECIAL_FILES: ReadonlyMap<string, SupportedLanguage> = new Map<string, SupportedLanguage>([
  ['dockerfile', 'dockerfile'],
  ['makefile', 'makefile'],
  ['gnumakefile', 'makefile'],
  ['gemfile', 'ruby'],
  ['rakefile', 'ruby'],
  ['podfile', 'ruby'],
  ['go.mod', 'go'],
  ['cargo.toml', 'toml'],
  ['pyproject.toml', 'toml'],
]);

export class LanguageDetector {
  private extensionMap: Map<string, SupportedLanguage> = new Map();

  constructor() {
    for (const [lang, extensions] of Object.entries(LANGUAGE_EXTENSIONS)) {
      for (const ext of extensions) {
        this.extensionMap.set(ext, lang as SupportedLanguage);
      }
    }
  }

  /**
   * Detect the language of a file from its name alone.
   */
  detect(filePath: string): SupportedLanguage {
    const ext = path.extname(filePath).toLowerCase();
    const byExt = this.extensionMap.get(ext);
    if (byExt) {
      return byExt;
    }

    const basename = path.basename(filePath).toLowerCase();
    return SPECIAL_FILES.get(basename) ?? 'unknown';
  }

  isKnown(lang: SupportedLanguage): boolean {
    return lang !== 'unknown';
  }

  getSupportedLanguages(): SupportedLanguage[] {
    return Object.keys(LANGUAGE_EXTENSIONS).filter((lang) => lang !== 'unknown') as SupportedLanguage[];
  }
}
