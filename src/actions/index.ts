type Action = (args: string[]) => Promise<boolean>;

export const actionFactories: Record<string, () => Promise<Action>> = {
  decompress: () => import('./decompress').then((m) => m.main),
  inspect: () => import('./inspect').then((m) => m.main),
};
