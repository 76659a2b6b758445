import createDebug from 'debug';

export const getDebug = (namespace: string) => {
  return createDebug(namespace);
};
