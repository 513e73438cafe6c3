import { Request } from "express";

/**
 * Identifies the account a management request acts for. Authentication is
 * done upstream by the session layer; this only reads its result.
 */
export type OwnerResolver = (req: Request) => string | null;

const DID_PATTERN = /^did:[a-z0-9]+:[A-Za-z0-9._:%-]+$/;

/**
 * Reads the owner DID from a header the authenticating proxy sets.
 */
export function headerOwnerResolver(headerName: string): OwnerResolver {
  const header = headerName.toLowerCase();
  return (req) => {
    const value = req.headers[header];
    const did = Array.isArray(value) ? value[0] : value;
    if (!did || !DID_PATTERN.test(did.trim())) {
      return null;
    }
    return did.trim();
  };
}
