import { Flags } from '@oclif/core';

export const configFlag = Flags.string({
  char: 'c',
  description:
    'Route configuration file or directory, directories are read recursively (repeatable)',
  env: 'CONFMOCK_CONFIG',
  multiple: true,
  default: ['./config']
});
