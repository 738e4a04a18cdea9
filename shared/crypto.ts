export const randomId = (): string => {
  const g: { crypto?: { randomUUID?: () => string } } = globalThis;
  if (g.crypto?.randomUUID) {
    return g.crypto.randomUUID();
  }
  return `stream_${Date.now()}_${Math.random().toString(16).slice(2)}`;
};
