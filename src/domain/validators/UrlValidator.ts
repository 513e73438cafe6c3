/**
 * Webhook target validation with SSRF guards.
 *
 * Rejects targets that name internal resources literally: localhost and
 * loopback, private, link-local, multicast, CGNAT and unspecified addresses.
 * Hostnames are not resolved, so a public name that resolves (or later
 * rebinds) to an internal address is not caught here.
 *
 * @security Blocks literal internal targets before a subscription is stored
 */

import { isIP } from "net";
import { WebhookValidationError } from "./WebhookValidationError";

interface Ipv4Range {
  start: string;
  end: string;
  label: string;
}

export class UrlValidator {
  private static readonly BLOCKED_IPV4_RANGES: Ipv4Range[] = [
    { start: "0.0.0.0", end: "0.255.255.255", label: "unspecified" },
    { start: "10.0.0.0", end: "10.255.255.255", label: "private (RFC 1918)" },
    { start: "100.64.0.0", end: "100.127.255.255", label: "shared address space (RFC 6598)" },
    { start: "127.0.0.0", end: "127.255.255.255", label: "loopback" },
    { start: "169.254.0.0", end: "169.254.255.255", label: "link-local (RFC 3927)" },
    { start: "172.16.0.0", end: "172.31.255.255", label: "private (RFC 1918)" },
    { start: "192.168.0.0", end: "192.168.255.255", label: "private (RFC 1918)" },
    { start: "224.0.0.0", end: "239.255.255.255", label: "multicast" },
    { start: "255.255.255.255", end: "255.255.255.255", label: "broadcast" },
  ];

  private static readonly BLOCKED_HOSTS = ["localhost"];

  /**
   * @param devMode - allows plain HTTP and internal hosts (local development only)
   * @throws {WebhookValidationError}
   */
  static validate(url: string, devMode: boolean = false): URL {
    let parsedUrl: URL;
    try {
      parsedUrl = new URL(url);
    } catch {
      throw new WebhookValidationError("invalid_url", "URL must be absolute and well formed");
    }

    if (parsedUrl.protocol !== "https:" && parsedUrl.protocol !== "http:") {
      throw new WebhookValidationError(
        "unsupported_scheme",
        `Unsupported scheme ${parsedUrl.protocol}; only http(s) is allowed`
      );
    }

    if (devMode) {
      return parsedUrl;
    }

    if (parsedUrl.protocol !== "https:") {
      throw new WebhookValidationError("https_required", "Webhook URL must use HTTPS");
    }

    const hostname = parsedUrl.hostname.toLowerCase().replace(/\.$/, "");

    if (
      this.BLOCKED_HOSTS.some((blocked) => hostname === blocked || hostname.endsWith(`.${blocked}`))
    ) {
      throw new WebhookValidationError("blocked_host", `Host ${hostname} is not allowed`);
    }

    // URL keeps IPv6 literals in brackets
    const literal = hostname.startsWith("[") ? hostname.slice(1, -1) : hostname;
    const family = isIP(literal);
    if (family === 4) {
      this.validateIpv4(literal);
    } else if (family === 6) {
      this.validateIpv6(literal);
    }

    return parsedUrl;
  }

  private static validateIpv4(ip: string): void {
    const ipNum = this.ipToNumber(ip);

    for (const range of this.BLOCKED_IPV4_RANGES) {
      if (ipNum >= this.ipToNumber(range.start) && ipNum <= this.ipToNumber(range.end)) {
        throw new WebhookValidationError(
          "private_address",
          `Address ${ip} is ${range.label} and cannot receive webhooks`
        );
      }
    }
  }

  private static validateIpv6(ip: string): void {
    const groups = this.expandIpv6(ip);

    const isUnspecified = groups.every((g) => g === 0);
    const isLoopback = groups.slice(0, 7).every((g) => g === 0) && groups[7] === 1;
    const isUniqueLocal = (groups[0] & 0xfe00) === 0xfc00; // fc00::/7
    const isLinkLocal = (groups[0] & 0xffc0) === 0xfe80; // fe80::/10
    const isMulticast = (groups[0] & 0xff00) === 0xff00; // ff00::/8

    if (isUnspecified || isLoopback || isUniqueLocal || isLinkLocal || isMulticast) {
      throw new WebhookValidationError(
        "private_address",
        `Address ${ip} is internal and cannot receive webhooks`
      );
    }

    // ::ffff:a.b.c.d (mapped) and ::a.b.c.d (compatible): judge the embedded IPv4 address
    const isMapped = groups.slice(0, 5).every((g) => g === 0) && groups[5] === 0xffff;
    const isCompatible = groups.slice(0, 6).every((g) => g === 0);
    if (isMapped || isCompatible) {
      const embedded = [groups[6] >> 8, groups[6] & 0xff, groups[7] >> 8, groups[7] & 0xff].join(".");
      this.validateIpv4(embedded);
    }
  }

  /**
   * Expands an IPv6 literal (with `::` and an optional dotted tail) to 8 groups.
   */
  private static expandIpv6(ip: string): number[] {
    let address = ip.split("%")[0];

    const dotted = address.match(/(\d+\.\d+\.\d+\.\d+)$/);
    if (dotted) {
      const v4 = this.ipToNumber(dotted[1]);
      const tail = `${((v4 >>> 16) & 0xffff).toString(16)}:${(v4 & 0xffff).toString(16)}`;
      address = address.slice(0, -dotted[1].length) + tail;
    }

    const [head, rest] = address.split("::");
    const headGroups = head ? head.split(":") : [];
    const tailGroups = rest !== undefined && rest.length > 0 ? rest.split(":") : [];
    const missing = rest === undefined ? 0 : 8 - headGroups.length - tailGroups.length;

    const groups = [...headGroups, ...Array<string>(missing).fill("0"), ...tailGroups].map((g) =>
      parseInt(g, 16)
    );

    if (groups.length !== 8 || groups.some((g) => Number.isNaN(g))) {
      throw new WebhookValidationError("invalid_url", `Invalid IPv6 address: ${ip}`);
    }

    return groups;
  }

  /**
   * "192.168.1.1" -> 3232235777
   */
  private static ipToNumber(ip: string): number {
    const parts = ip.split(".").map((part) => parseInt(part, 10));

    if (parts.length !== 4 || parts.some((p) => isNaN(p) || p < 0 || p > 255)) {
      throw new WebhookValidationError("invalid_url", `Invalid IPv4 address: ${ip}`);
    }

    return ((parts[0] << 24) + (parts[1] << 16) + (parts[2] << 8) + parts[3]) >>> 0;
  }
}
