import { Command, Flags } from '@oclif/core';
import {
  ConfmockServer,
  RouteConfigLoader,
  ServerMessages,
  createServerLogger,
  listenServerEvents
} from 'confmock-commons-server';
import { format } from 'util';
import { configFlag } from '../libs/flags';

/**
 * Start the mock server
 */
export default class Start extends Command {
  public static override description =
    'Start a mock API server from YAML/JSON route files';

  public static override examples = [
    '<%= config.bin %> <%= command.id %> --config ./config',
    '<%= config.bin %> <%= command.id %> -c ./config/auth.yaml -c ./config/extra -p 3000',
    '<%= config.bin %> <%= command.id %> --webhook-url http://localhost:9000/hooks --log-dir ./logs'
  ];

  public static override flags = {
    config: configFlag,
    port: Flags.integer({
      char: 'p',
      description: 'Server port',
      env: 'PORT',
      default: 8000
    }),
    hostname: Flags.string({
      char: 'l',
      description: 'Listening hostname',
      env: 'HOST',
      default: '0.0.0.0'
    }),
    'webhook-url': Flags.string({
      description: 'Value of the {$webhook_url} token',
      env: 'WEBHOOK_URL'
    }),
    'log-dir': Flags.string({
      description: 'Directory of the rotating api.log file',
      env: 'LOG_DIR'
    }),
    'log-level': Flags.string({
      description: 'Minimum log level',
      env: 'LOG_LEVEL',
      options: ['error', 'warn', 'info', 'debug'],
      default: 'info'
    }),
    'log-transaction': Flags.boolean({
      char: 't',
      description: 'Log the full transactions (request and response)',
      default: false
    }),
    'log-json': Flags.boolean({
      description: 'Write console logs as JSON',
      default: false
    }),
    'disable-admin-api': Flags.boolean({
      description: 'Disable the /__admin/logs endpoint',
      default: false
    })
  };

  public async run(): Promise<void> {
    const { flags } = await this.parse(Start);

    const logger = createServerLogger({
      level: flags['log-level'],
      logDir: flags['log-dir'],
      json: flags['log-json']
    });

    const loader = new RouteConfigLoader();

    try {
      loader.loadConfig(flags.config);
    } catch (error) {
      this.error(
        `Failed to load configuration: ${
          error instanceof Error ? error.message : String(error)
        }`,
        { exit: 1 }
      );
    }

    loader
      .getWarnings()
      .forEach((warning) =>
        logger.warn(format(ServerMessages.CONFIG_WARNING, warning))
      );
    logger.info(
      format(
        ServerMessages.ROUTES_LOADED,
        loader.getRoutes().length,
        loader.getSourceFiles().length
      )
    );

    const server = new ConfmockServer(loader.getRoutes(), {
      port: flags.port,
      hostname: flags.hostname,
      webhookUrl: flags['webhook-url'],
      enableAdminApi: !flags['disable-admin-api']
    });

    listenServerEvents(
      server,
      { port: flags.port, hostname: flags.hostname },
      logger,
      flags['log-transaction']
    );

    const stop = () => {
      server.stop();
    };

    process.once('SIGINT', stop);
    process.once('SIGTERM', stop);

    server.start();
  }
}
