export type EnvSource = Readonly<Record<string, string | undefined>>;

export interface Resolver {
  lookup(name: string): string | undefined;
}

/** Snapshots `env` once; later changes to the source are not seen. */
export function createResolver(env: EnvSource = process.env): Resolver {
  const snapshot: ReadonlyMap<string, string> = new Map(
    Object.entries(env).filter((e): e is [string, string] => e[1] !== undefined),
  );
  return Object.freeze({
    lookup: (name: string) => snapshot.get(name),
  });
}
