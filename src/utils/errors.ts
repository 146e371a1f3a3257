export const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null;

const pickMessage = (value: unknown): string | null => {
  if (typeof value === 'string' && value.trim().length > 0) {
    return value;
  }

  if (isRecord(value) && typeof value.message === 'string' && value.message.trim().length > 0) {
    return value.message;
  }

  return null;
};

export const extractErrorMessage = (error: unknown, fallback: string): string => {
  if (error instanceof Error && error.message.trim().length > 0) {
    return error.message;
  }
  return pickMessage(error) ?? fallback;
};
