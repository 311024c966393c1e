/** ignoreファイル名 */
export const IGNORE_FILE_NAME = '.thanosignore';

/** 重み設定ファイル名（探索順） */
export const RC_FILE_NAMES = ['.thanosrc.json', '.thanosrc.yaml', '.thanosrc.yml'] as const;

/**
 * ignoreファイルがない場合のデフォルト保護パターン
 */
export const DEFAULT_PROTECTED_PATTERNS: readonly string[] = [
  // バージョン管理
  '.git',
  '.git/',
  '.gitignore',
  '.gitattributes',
  '.svn',
  '.hg',
  // 仮想環境・依存ディレクトリ（件数が多く抽出結果を偏らせる）
  'venv/',
  '.venv/',
  'env/',
  '.env.local/',
  '__pycache__/',
  'node_modules/',
  // バイトコンパイル成果物
  '*.pyc',
  '*.pyo',
  // 環境変数・設定
  '.env',
  '.env.*',
  '*.config',
  'config.yml',
  'config.yaml',
  // ロックファイル
  'package-lock.json',
  'yarn.lock',
  'pnpm-lock.yaml',
  'Cargo.lock',
  'Pipfile.lock',
  'poetry.lock',
  'Gemfile.lock',
  'uv.lock',
  // ツール自身の設定
  IGNORE_FILE_NAME,
  ...RC_FILE_NAMES,
  // IDE
  '.vscode/',
  '.idea/',
  // データベース
  '*.db',
  '*.sqlite',
];

export function defaultProtectedPatterns(): Set<string> {
  return new Set(DEFAULT_PROTECTED_PATTERNS);
}

/**
 * `thanos init` が生成する .thanosignore
 */
export const IGNORE_FILE_TEMPLATE = `# Thanos Ignore File
# Patterns listed here will be protected from elimination

# Large dependency folders
node_modules/**
venv/**
.venv/**
__pycache__/**

# Important directories
important/**
backup/**
docs/**

# Database files
*.db
*.sqlite

# System & Config
.env
.git/**
.vscode/**
.idea/**

# Important data files
*-important.*
*-backup.*
`;

/**
 * `thanos init` が生成する .thanosrc.json の内容
 */
export const RC_FILE_TEMPLATE = {
  weights: {
    by_extension: {
      '.log': 0.9,
      '.tmp': 0.95,
      '.cache': 0.95,
      '.bak': 0.8,
      '.old': 0.8,
      '.py': 0.3,
      '.js': 0.3,
      '.db': 0.1,
      '.json': 0.2,
    },
  },
} as const;
