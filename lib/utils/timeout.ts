export async function withTimeout<T>(p: Promise<T>, ms: number, msg: string): Promise<T> {
  let to: NodeJS.Timeout | undefined;
  return await Promise.race<T>([
    p.finally(() => clearTimeout(to)),
    new Promise<T>((_, rej) => {
      to = setTimeout(() => rej(new Error(msg)), ms);
    }),
  ]);
}

export function sleep(ms: number) {
  return new Promise<void>((r) => setTimeout(r, ms));
}
