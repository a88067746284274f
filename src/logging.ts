import debug from 'debug';

export const NAMESPACES = {
  search: {
    engine: 'plotsearch:search:engine',
    driver: 'plotsearch:search:driver'
  },
  agents: {
    base: 'plotsearch:agents:base',
    writer: 'plotsearch:agents:writer',
    critic: 'plotsearch:agents:critic',
    oracle: 'plotsearch:agents:oracle'
  },
  llm: {
    client: 'plotsearch:llm:client',
    custom: 'plotsearch:llm:custom'
  },
  config: 'plotsearch:config'
} as const;

export type Logger = debug.Debugger;

export const createLogger = (namespace: string): Logger => debug(namespace);

export const enableNamespaces = (namespaces: string): void => {
  debug.enable(namespaces);
};
