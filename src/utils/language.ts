import path from 'node:path';

const EXTENSION_LANGUAGES: Record<string, string> = {
    '.py': 'python',
    '.js': 'javascript',
    '.mjs': 'javascript',
    '.cjs': 'javascript',
    '.ts': 'typescript',
    '.html': 'html',
    '.css': 'css',
    '.json': 'json',
    '.md': 'markdown',
    '.sh': 'bash',
    '.c': 'c',
    '.h': 'c',
    '.cpp': 'cpp',
    '.hpp': 'cpp',
    '.java': 'java',
    '.rs': 'rust',
    '.go': 'go',
    '.rb': 'ruby',
    '.php': 'php',
    '.lua': 'lua',
    '.yaml': 'yaml',
    '.yml': 'yaml',
};

/**
 * Language identifier for a file, from its extension. Unknown or unsaved → "text".
 */
export function languageForPath(filePath: string | null | undefined): string {
    if (!filePath) return 'text';
    return EXTENSION_LANGUAGES[path.extname(filePath).toLowerCase()] ?? 'text';
}
