export const isoNow = (): string => new Date().toISOString();

export const hoursBetween = (fromIso: string, to: Date): number => (
  (to.getTime() - new Date(fromIso).getTime()) / (60 * 60 * 1000)
);
