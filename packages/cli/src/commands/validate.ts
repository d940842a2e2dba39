import { Command } from '@oclif/core';
import { RouteConfigLoader } from 'confmock-commons-server';
import { configFlag } from '../libs/flags';
import {
  describeRoutes,
  findUnknownSyntheticTokens,
  formatRouteTable
} from '../libs/route-table';

/**
 * Load the route files without starting a server
 */
export default class Validate extends Command {
  public static override description =
    'Check route files and print the resulting route table';

  public static override examples = [
    '<%= config.bin %> <%= command.id %>',
    '<%= config.bin %> <%= command.id %> --config ./config/auth.yaml'
  ];

  public static override flags = {
    config: configFlag
  };

  public async run(): Promise<void> {
    const { flags } = await this.parse(Validate);
    const loader = new RouteConfigLoader();

    try {
      loader.loadConfig(flags.config);
    } catch (error) {
      this.error(error instanceof Error ? error.message : String(error), {
        exit: 1
      });
    }

    const routes = loader.getRoutes();

    formatRouteTable(describeRoutes(routes)).forEach((line) => this.log(line));
    loader.getWarnings().forEach((warning) => this.warn(warning));
    findUnknownSyntheticTokens(routes).forEach(({ method, path, token }) =>
      this.warn(`${method} ${path}: unknown token {${token}}`)
    );

    this.log(
      `\n${routes.length} route(s) loaded from ${loader.getSourceFiles().length} file(s)`
    );
  }
}
