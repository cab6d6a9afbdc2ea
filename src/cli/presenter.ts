/**
 * CLI Presenter
 *
 * Terminal implementation of the presentation boundary.
 *
 * @module cli/presenter
 */

import chalk from 'chalk';
import type {
  Post,
  PostsSortOrder,
  Route,
  RouteDbStatus,
  RoutesSortOrder,
  Summit,
} from '../routedb/types.js';
import type { PresentationBoundary } from '../usecases/presentation.js';
import type { BaseCommand } from './base-command.js';
import type { ProgressSpinner } from './formatters/progress.js';
import { formatDate, formatRating, formatTable } from './formatters/tables.js';

const ROUTES_SORT_LABELS: Record<RoutesSortOrder, string> = {
  name: 'by name',
  grade: 'by grade',
  rating: 'by rating',
};

const POSTS_SORT_LABELS: Record<PostsSortOrder, string> = {
  newestFirst: 'newest first',
  oldestFirst: 'oldest first',
};

export class CliPresenter implements PresentationBoundary {
  private spinner: ProgressSpinner | null = null;

  constructor(private readonly base: BaseCommand) {}

  /**
   * Stop `spinner` before the next output, so that lines are not
   * overwritten by its animation.
   */
  attachSpinner(spinner: ProgressSpinner | null): void {
    this.spinner = spinner;
  }

  updateRouteDbStatus(status: RouteDbStatus): void {
    this.beforeOutput();

    if (status.activated) {
      this.base.success(`Route database active (${status.label})`);
      return;
    }

    this.base.fail(status.message);
    if (status.reason) {
      console.log(chalk.dim(`  ${status.reason}`));
    }
  }

  updateSummitList(summits: Summit[]): void {
    this.beforeOutput();

    if (summits.length === 0) {
      this.base.info('No summits found.');
      return;
    }

    const lines = formatTable(
      [
        { header: 'ID', width: 6, align: 'right' },
        { header: 'SUMMIT', width: 40 },
      ],
      summits.map((summit) => [String(summit.id), summit.name])
    );
    lines.forEach((line) => console.log(line));
    this.base.blank();
    this.base.info(`Total: ${summits.length} summit${summits.length === 1 ? '' : 's'}`);
  }

  updateRouteList(summit: Summit, routes: Route[], sortOrder: RoutesSortOrder): void {
    this.beforeOutput();
    this.base.section(`Routes on ${summit.name} (${ROUTES_SORT_LABELS[sortOrder]})`);

    if (routes.length === 0) {
      this.base.info('No routes found.');
      return;
    }

    const lines = formatTable(
      [
        { header: 'ID', width: 6, align: 'right' },
        { header: 'ROUTE', width: 36 },
        { header: 'GRADE', width: 8 },
        { header: 'RATING', width: 6, align: 'right' },
      ],
      routes.map((route) => [String(route.id), route.name, route.grade, formatRating(route.rating)])
    );
    lines.forEach((line) => console.log(line));
  }

  updatePostList(route: Route, posts: Post[], sortOrder: PostsSortOrder): void {
    this.beforeOutput();
    this.base.section(`Posts about ${route.name} (${POSTS_SORT_LABELS[sortOrder]})`);

    if (posts.length === 0) {
      this.base.info('No posts found.');
      return;
    }

    for (const post of posts) {
      console.log(`${formatDate(post.postDate)}  ${chalk.bold(post.userName)}  rating ${post.rating}`);
      if (post.comment) {
        console.log(`  ${post.comment}`);
      }
    }
  }

  private beforeOutput(): void {
    if (this.spinner?.isSpinning()) {
      this.spinner.stop();
    }
  }
}
