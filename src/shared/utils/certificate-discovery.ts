// Direct certificate discovery over DNS CERT records and LDAP directories
import { X509Certificate } from 'crypto';
import { promises as dns } from 'dns';
import type { SrvRecord } from 'dns';
import { promises as fs } from 'fs';
import { Client, EqualityFilter } from 'ldapts';
import type { Entry } from 'ldapts';
import type { CertificateDiscovery, CertificateDiscoveryResult, Reporter } from '../models';
import { config } from './environment';
import { describeError, hasErrorCode, wrapError } from './error-handling';
import { splitAddress } from './validation';

export interface CertificateDiscoveryOptions {
  dohUrl?: string;
  timeoutMs?: number;
  /** Issuers accepted when chain verification is requested */
  trustAnchors?: X509Certificate[];
  reporter?: Reporter;
}

interface DohAnswer {
  name: string;
  type: number;
  data: string;
}

interface DohResponse {
  Status: number;
  Answer?: DohAnswer[];
}

const CERT_RECORD_TYPE = 37;
const DNS_NXDOMAIN = 3;
const CERTIFICATE_ATTRIBUTES = ['userCertificate;binary', 'userCertificate'];

function isDohAnswer(value: unknown): value is DohAnswer {
  return typeof value === 'object' && value !== null &&
    'type' in value && typeof value.type === 'number' &&
    'data' in value && typeof value.data === 'string';
}

function isDohResponse(value: unknown): value is DohResponse {
  if (typeof value !== 'object' || value === null || !('Status' in value) || typeof value.Status !== 'number') {
    return false;
  }

  return !('Answer' in value) || (Array.isArray(value.Answer) && value.Answer.every(isDohAnswer));
}

/**
 * Owner name of an address-bound CERT record: the @ becomes a label separator
 */
export function addressBoundOwnerName(localPart: string, domain: string): string {
  return `${localPart}.${domain}`;
}

/**
 * Extracts the DER payload of a PKIX CERT record ("<type> <key tag> <algorithm> <base64>")
 */
export function parseCertRecordData(data: string): Buffer | null {
  const parts = data.trim().split(/\s+/);
  if (parts.length < 4) {
    return null;
  }

  const certType = parts[0].toUpperCase();
  if (certType !== '1' && certType !== 'PKIX') {
    return null;
  }

  const der = Buffer.from(parts.slice(3).join(''), 'base64');
  return der.length > 0 ? der : null;
}

export function parseCertificate(der: Buffer): X509Certificate | null {
  try {
    return new X509Certificate(der);
  } catch {
    return null;
  }
}

/**
 * Without chain verification any parseable certificate counts. With it, the
 * certificate must be current and issued by one of the trust anchors.
 */
export function isAcceptedCertificate(
  certificate: X509Certificate,
  verifyChain: boolean,
  trustAnchors: readonly X509Certificate[],
  now: Date = new Date()
): boolean {
  if (!verifyChain) {
    return true;
  }

  const current = new Date(certificate.validFrom) <= now && now <= new Date(certificate.validTo);
  if (!current) {
    return false;
  }

  return trustAnchors.some(anchor => certificate.checkIssued(anchor) && certificate.verify(anchor.publicKey));
}

/**
 * Reads every PEM certificate of a bundle file
 */
export async function loadTrustAnchors(bundlePath: string): Promise<X509Certificate[]> {
  let pem: string;
  try {
    pem = await fs.readFile(bundlePath, 'utf8');
  } catch (error) {
    throw wrapError(error, { operation: 'read trust anchor bundle', path: bundlePath });
  }

  const blocks = pem.match(/-----BEGIN CERTIFICATE-----[\s\S]+?-----END CERTIFICATE-----/g) || [];
  return blocks.map(block => new X509Certificate(block));
}

function entryBuffers(value: Entry[string] | undefined): Buffer[] {
  if (value === undefined) {
    return [];
  }

  const values: Array<Buffer | string> = Array.isArray(value) ? value : [value];
  return values.filter((item): item is Buffer => Buffer.isBuffer(item));
}

export function createCertificateDiscovery(options: CertificateDiscoveryOptions = {}): CertificateDiscovery {
  const {
    dohUrl = config.dohUrl,
    timeoutMs = config.discoveryTimeoutMs,
    trustAnchors = [],
    reporter = console
  } = options;

  async function queryCertRecords(ownerName: string): Promise<Buffer[]> {
    const url = `${dohUrl}?name=${encodeURIComponent(ownerName)}&type=CERT`;
    const response = await fetch(url, {
      headers: { Accept: 'application/dns-json' },
      signal: AbortSignal.timeout(timeoutMs)
    });

    if (!response.ok) {
      throw new Error(`DNS query for ${ownerName} returned HTTP ${response.status}`);
    }

    const body: unknown = await response.json();
    if (!isDohResponse(body)) {
      throw new Error(`DNS query for ${ownerName} returned an unexpected response`);
    }

    if (body.Status === DNS_NXDOMAIN) {
      return [];
    }

    return (body.Answer || [])
      .filter(answer => answer.type === CERT_RECORD_TYPE)
      .map(answer => parseCertRecordData(answer.data))
      .filter((der): der is Buffer => der !== null);
  }

  async function locateDirectories(domain: string): Promise<SrvRecord[]> {
    try {
      const records = await dns.resolveSrv(`_ldap._tcp.${domain}`);
      return [...records].sort((a, b) => a.priority - b.priority || b.weight - a.weight);
    } catch (error) {
      if (hasErrorCode(error, 'ENOTFOUND') || hasErrorCode(error, 'ENODATA')) {
        return [];
      }
      throw error;
    }
  }

  async function searchDirectory(directory: SrvRecord, address: string): Promise<Buffer[]> {
    const client = new Client({
      url: `ldap://${directory.name}:${directory.port}`,
      timeout: timeoutMs,
      connectTimeout: timeoutMs
    });

    try {
      const rootDse = await client.search('', {
        scope: 'base',
        filter: '(objectClass=*)',
        attributes: ['namingContexts']
      });
      const namingContexts = rootDse.searchEntries.flatMap(entry => {
        const value = entry.namingContexts;
        const values: Array<Buffer | string> = Array.isArray(value) ? value : [value];
        return values.filter((item): item is string => typeof item === 'string');
      });

      const certificates: Buffer[] = [];
      for (const baseDn of namingContexts) {
        const { searchEntries } = await client.search(baseDn, {
          scope: 'sub',
          filter: new EqualityFilter({ attribute: 'mail', value: address }),
          attributes: CERTIFICATE_ATTRIBUTES,
          explicitBufferAttributes: CERTIFICATE_ATTRIBUTES
        });

        for (const entry of searchEntries) {
          CERTIFICATE_ATTRIBUTES.forEach(attribute => certificates.push(...entryBuffers(entry[attribute])));
        }
      }

      return certificates;
    } finally {
      await client.unbind();
    }
  }

  async function lookup(source: string, target: string, query: () => Promise<Buffer[]>): Promise<Buffer[]> {
    try {
      return await query();
    } catch (error) {
      reporter.warn(`Certificate lookup via ${source} failed for ${target}: ${describeError(error)}`);
      return [];
    }
  }

  return {
    async discover(endpointAddress: string, verifyChain: boolean): Promise<CertificateDiscoveryResult> {
      const parts = splitAddress(endpointAddress);
      if (!parts) {
        return { found: false };
      }

      const address = `${parts.localPart}@${parts.domain}`;
      const accepts = (der: Buffer): boolean => {
        const certificate = parseCertificate(der);
        return certificate !== null && isAcceptedCertificate(certificate, verifyChain, trustAnchors);
      };

      // Address-bound records take precedence over domain-bound ones
      for (const ownerName of [addressBoundOwnerName(parts.localPart, parts.domain), parts.domain]) {
        const records = await lookup('DNS', ownerName, () => queryCertRecords(ownerName));
        if (records.some(accepts)) {
          return { found: true, method: 'DNS' };
        }
      }

      const directories = await lookup('LDAP', parts.domain, async () => {
        const found: Buffer[] = [];
        for (const directory of await locateDirectories(parts.domain)) {
          found.push(...(await searchDirectory(directory, address)));
          if (found.some(accepts)) {
            break;
          }
        }
        return found;
      });

      if (directories.some(accepts)) {
        return { found: true, method: 'LDAP' };
      }

      return { found: false };
    }
  };
}
