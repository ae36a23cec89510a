import { format } from "winston";

const flattenError = (error: Error) => ({
  name: error.name,
  message: error.message,
  ...("code" in error && typeof error.code === "string" ? { code: error.code } : {}),
});

// winston serializes Error instances in metadata as {}
export const plainErrors = format((info) => {
  for (const [key, value] of Object.entries(info)) {
    if (value instanceof Error) info[key] = flattenError(value);
  }
  return info;
});
