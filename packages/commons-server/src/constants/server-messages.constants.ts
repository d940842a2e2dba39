export const ServerMessages = {
  SERVER_STARTED: 'Server started on port %s',
  SERVER_STOPPED: 'Server has been stopped',
  PORT_ALREADY_USED:
    'Port "%s" is already in use, please verify that no other application is using this port',
  PORT_INVALID: 'Port "%s" is invalid or access is denied',
  HOSTNAME_UNAVAILABLE: 'Hostname "%s" is unavailable',
  HOSTNAME_UNKNOWN: 'Hostname "%s" is unknown',
  UNKNOWN_SERVER_ERROR: 'Server error: %s',
  REQUEST_BODY_PARSE: 'Error while parsing the request body: %s',
  ROUTE_SERVING_ERROR: 'Error while serving the route: %s',
  WEBHOOK_ERROR: 'Webhook "%s" to %s failed: %s',
  WEBHOOK_DISPATCHED: 'Webhook "%s" sent to %s',
  ROUTES_LOADED: '%s route(s) loaded from %s file(s)',
  CONFIG_WARNING: 'Configuration warning: %s'
} as const;
