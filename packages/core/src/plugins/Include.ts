/**
 * Include plugin - `Include path;` / `Include "path with spaces";`
 *
 * Compiles another rule file into the same session. The path is looked up
 * beside the including file first, then in each include path.
 */

import { existsSync } from 'fs';
import { dirname, isAbsolute, resolve } from 'path';
import { createToken } from 'chevrotain';
import type { SourceLocation } from '@layoutforge/types';
import type { StatementValue } from '../compiler/outcomes.js';
import { FileAccessError } from '../errors/LayoutError.js';
import { BaseTransformer } from './BaseTransformer.js';
import { definePlugin, defineVerb } from './types.js';

const IncludePath = createToken({ name: 'IncludePath', pattern: /"[^"]*"|[^\s"]+/ });

export interface IncludeArgs {
  path: string;
  location: SourceLocation;
}

class IncludeTransformer extends BaseTransformer<IncludeArgs> {
  action(args: IncludeArgs): StatementValue {
    const file = this.locate(args);
    this.logger.debug(`Including ${file}`, { from: this.address });
    const outcomes = this.context.compileFile(file);
    return { kind: 'include', file, outcomes };
  }

  private locate({ path, location }: IncludeArgs): string {
    if (isAbsolute(path)) {
      return path;
    }
    const current = this.context.location.file;
    const bases = [current ? dirname(current) : process.cwd(), ...this.context.includePaths];
    const candidates = bases.map(base => resolve(base, path));
    const found = candidates.find(candidate => existsSync(candidate));
    if (!found) {
      throw new FileAccessError(
        `Cannot find included file '${path}'`,
        'ERR_FILE_UNREADABLE',
        { file: location.file, line: location.line, column: location.column, verb: this.context.verb, searched: candidates },
        'Check the path or add its directory to includePaths in .layoutforge/config.yaml'
      );
    }
    return found;
  }
}

export const IncludeVerb = defineVerb<IncludeArgs>({
  name: 'Include',
  grammar(g) {
    return g.rule('include', () => {
      const path = g.consume(0, IncludePath);
      return g.action((): IncludeArgs => ({
        path: path.image.startsWith('"') ? path.image.slice(1, -1) : path.image,
        location: g.locate(path),
      }));
    });
  },
  transformer: context => new IncludeTransformer(context),
});

export const IncludePlugin = definePlugin<undefined>({
  name: 'Include',
  options: { useHelpers: false },
  tokens: [IncludePath],
  grammar: () => undefined,
  verbs: [IncludeVerb],
});
