import type { Plugin, ViteDevServer } from 'vite';
import { readdirSync, existsSync } from 'node:fs';
import { resolve, relative, sep } from 'node:path';
import { formatSegments, parseRoutePath } from '@stalewise/engine';

export interface StalewiseViteOptions {
  /** Path to pages directory relative to project root (default: src/pages) */
  pagesDirectory?: string;
}

export const VIRTUAL_MODULE_ID = 'virtual:stalewise-routes';
const RESOLVED_VIRTUAL_MODULE_ID = '\0virtual:stalewise-routes';

const DEFAULT_PAGES_DIRECTORY = 'src/pages';
const PAGE_EXTENSIONS = ['tsx', 'jsx', 'ts', 'js'];
const EMPTY_MODULE = 'export default [];';

function isPageFile(name: string): boolean {
  if (name.startsWith('_') || name.endsWith('.d.ts')) return false;
  return PAGE_EXTENSIONS.some((ext) => name.endsWith(`.${ext}`));
}

/**
 * Whether a watched file is a page `scanPages` would list. Sibling
 * directories sharing the prefix (`src/pages-old`) don't count.
 */
export function isWatchedPage(pagesPath: string, filePath: string): boolean {
  if (!filePath.startsWith(pagesPath + sep)) return false;
  const parts = filePath.slice(pagesPath.length + 1).split(sep);
  return parts.every((part) => !part.startsWith('_')) && isPageFile(parts[parts.length - 1]);
}

/**
 * List page files under `dir`, as sorted POSIX paths relative to it.
 * Files and directories starting with "_" are private and skipped.
 */
export function scanPages(dir: string): string[] {
  const files: string[] = [];

  function walk(current: string): void {
    for (const entry of readdirSync(current, { withFileTypes: true })) {
      const full = resolve(current, entry.name);
      if (entry.isDirectory()) {
        if (!entry.name.startsWith('_')) walk(full);
      } else if (entry.isFile() && isPageFile(entry.name)) {
        files.push(relative(dir, full).split(sep).join('/'));
      }
    }
  }

  walk(dir);
  return files.sort();
}

/**
 * Derive a route path from a page file: "blog/[...slug].tsx" -> "/blog/[...slug]",
 * "docs/index.ts" -> "/docs", "index.tsx" -> "/".
 */
export function fileToRoutePath(file: string): string {
  const withoutExt = file.replace(/\.[^./]+$/, '');
  const parts = withoutExt.split('/').filter(Boolean);
  if (parts[parts.length - 1] === 'index') {
    parts.pop();
  }
  // Round-trip through the parser so malformed names fail at build time
  return formatSegments(parseRoutePath(parts.join('/')));
}

/**
 * Generate the source of the virtual routes module: one namespace import per
 * page and a default export of manifest entries.
 */
export function generateRoutesModule(pagesDir: string, files: readonly string[]): string {
  const seen = new Map<string, string>();
  const imports: string[] = [];
  const entries: string[] = [];

  files.forEach((file, index) => {
    const path = fileToRoutePath(file);
    const previous = seen.get(path);
    if (previous) {
      throw new Error(`[stalewise] "${previous}" and "${file}" both define ${path}`);
    }
    seen.set(path, file);

    const name = `page${index}`;
    imports.push(`import * as ${name} from ${JSON.stringify(`/${pagesDir}/${file}`)};`);
    entries.push(`  { id: ${JSON.stringify(path)}, path: ${JSON.stringify(path)}, module: ${name} },`);
  });

  if (entries.length === 0) {
    return EMPTY_MODULE;
  }

  return `${imports.join('\n')}\n\nexport default [\n${entries.join('\n')}\n];\n`;
}

export default function stalewise(options?: StalewiseViteOptions): Plugin {
  let pagesDir = options?.pagesDirectory ?? DEFAULT_PAGES_DIRECTORY;
  let pagesPath = resolve(pagesDir);
  let debounceTimer: ReturnType<typeof setTimeout> | null = null;

  return {
    name: 'stalewise',

    configResolved(resolvedConfig) {
      pagesDir = (options?.pagesDirectory ?? DEFAULT_PAGES_DIRECTORY).replace(/^\/+|\/+$/g, '');
      pagesPath = resolve(resolvedConfig.root, pagesDir);
    },

    configureServer(server: ViteDevServer) {
      server.watcher.add(pagesPath);

      // Adding or removing a page changes the route table; edits inside a page don't
      const handleChange = (filePath: string) => {
        if (!isWatchedPage(pagesPath, filePath)) {
          return;
        }

        if (debounceTimer) {
          clearTimeout(debounceTimer);
        }

        debounceTimer = setTimeout(() => {
          debounceTimer = null;
          const mod = server.moduleGraph.getModuleById(RESOLVED_VIRTUAL_MODULE_ID);
          if (mod) {
            server.moduleGraph.invalidateModule(mod);
          }
          console.log(`[stalewise] Pages changed, reloading routes`);
          server.ws.send({ type: 'full-reload', path: '*' });
        }, 300);
      };

      server.watcher.on('add', handleChange);
      server.watcher.on('unlink', handleChange);
    },

    resolveId(id: string) {
      if (id === VIRTUAL_MODULE_ID) {
        return RESOLVED_VIRTUAL_MODULE_ID;
      }
    },

    load(id: string) {
      if (id !== RESOLVED_VIRTUAL_MODULE_ID) return;

      if (!existsSync(pagesPath)) {
        console.warn(`[stalewise] Pages directory not found at ${pagesPath}. No routes generated.`);
        return EMPTY_MODULE;
      }

      const files = scanPages(pagesPath);
      console.log(`[stalewise] Routes generated (${files.length} pages)`);
      return generateRoutesModule(pagesDir, files);
    },
  };
}
