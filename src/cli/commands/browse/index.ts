/**
 * Browsing Commands
 *
 * - summits: List summits
 * - routes: List the routes on a summit
 * - posts: List the posts about a route
 *
 * @module cli/commands/browse
 */

import type { Command } from 'commander';
import { registerSummitsCommand } from './summits.js';
import { registerRoutesCommand } from './routes.js';
import { registerPostsCommand } from './posts.js';

export function registerBrowseCommands(program: Command): void {
  registerSummitsCommand(program);
  registerRoutesCommand(program);
  registerPostsCommand(program);
}

export { handleSummits } from './summits.js';
export { handleRoutes, type RoutesOptions } from './routes.js';
export { handlePosts, type PostsOptions } from './posts.js';
