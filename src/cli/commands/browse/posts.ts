/**
 * Posts Command
 *
 * Lists the posts about a route.
 *
 * @module cli/commands/browse/posts
 */

import { Option, type Command } from 'commander';
import { POSTS_SORT_ORDERS, type PostsSortOrder } from '../../../routedb/types.js';
import { EXIT_CODES, getBaseCommand, type BaseCommand, type ExitCode } from '../../base-command.js';
import { runCommand, type CliServices } from '../../services.js';
import { openRouteDb, parseId } from '../shared.js';

export interface PostsOptions {
  /** Sort order; the saved one is used when omitted */
  sort?: PostsSortOrder;
}

export function registerPostsCommand(program: Command): void {
  program
    .command('posts <routeId>')
    .description('List the posts about a route')
    .addOption(
      new Option('-s, --sort <order>', 'Sort order (remembered for next time)').choices(
        POSTS_SORT_ORDERS
      )
    )
    .action(async (routeId: string, options: PostsOptions, cmd: Command) => {
      const base = getBaseCommand(cmd);
      await runCommand(base, (services) => handlePosts(routeId, options, base, services));
    });
}

export async function handlePosts(
  routeId: string,
  options: PostsOptions,
  base: BaseCommand,
  services: CliServices
): Promise<ExitCode> {
  const id = parseId(routeId);
  if (id === null) {
    base.fail(`Invalid route ID: ${routeId}`);
    return EXIT_CODES.USAGE_ERROR;
  }

  if (!(await openRouteDb(base, services))) {
    return EXIT_CODES.NOT_FOUND;
  }

  const posts = await services.useCases.showPostList(id, options.sort);
  if (posts === null) {
    base.fail(`Route not found: ${id}`);
    return EXIT_CODES.NOT_FOUND;
  }
  return EXIT_CODES.SUCCESS;
}
