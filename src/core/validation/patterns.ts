/**
 * Core validation patterns used across all cloud providers
 * These patterns are compiled once and reused throughout the application
 */

import { domainToASCII } from 'node:url'
import { parse as parseDomain } from 'tldts'

/**
 * Provider-agnostic validation patterns
 */
export const CORE_VALIDATION_PATTERNS = {
    /**
     * ASCII hostname: dot-separated labels of 1-63 alphanumerics/dashes, 253 chars max.
     * Underscores are allowed in every label but the last (`_dmarc.example.com`).
     */
    HOSTNAME: /^(?=.{1,253}$)(?:[a-z0-9_](?:[a-z0-9_-]{0,61}[a-z0-9_])?\.)*[a-z0-9](?:[a-z0-9-]{0,61}[a-z0-9])?$/i,

    NON_ASCII: /[^\x00-\x7f]/,

    /** OpenSSH public key line (key type prefix followed by base64 body) */
    PUBLIC_KEY: /^(ssh-rsa|ssh-dss|ssh-ed25519|ecdsa-sha2-[a-z0-9-]+) \S+/,

    /** PEM private key header (RSA, EC, OPENSSH or PKCS#8) */
    PRIVATE_KEY: /^-----BEGIN (?:[A-Z]+ )?PRIVATE KEY-----/,
} as const

export const PORT_RANGE = { min: 1, max: 65535 } as const

/**
 * Validation utilities shared by every options class
 */
export class CoreValidators {
    /**
     * Validates hostname syntax only (no suffix lookup)
     */
    static isValidHostname(name: string): boolean {
        return typeof name === 'string' && CORE_VALIDATION_PATTERNS.HOSTNAME.test(name)
    }

    /**
     * True when the hostname ends in a suffix listed by the Public Suffix List,
     * ICANN or private section. Bare names ("localhost") and IP addresses fail.
     * One trailing dot is ignored and internationalized names are checked in
     * their punycode form.
     */
    static hasPublicSuffix(name: string): boolean {
        if (typeof name !== 'string') {
            return false
        }
        const absolute = name.endsWith('.') ? name.slice(0, -1) : name
        const ascii = CORE_VALIDATION_PATTERNS.NON_ASCII.test(absolute) ? domainToASCII(absolute) : absolute
        if (!CoreValidators.isValidHostname(ascii)) {
            return false
        }
        const result = parseDomain(ascii.toLowerCase(), { allowPrivateDomains: true, validateHostname: false })
        return result.isIp !== true && (result.isIcann === true || result.isPrivate === true)
    }

    static isValidPort(port: number): boolean {
        return Number.isInteger(port) && port >= PORT_RANGE.min && port <= PORT_RANGE.max
    }

    static isPositiveInteger(value: number): boolean {
        return Number.isInteger(value) && value > 0
    }

    static isNonEmptyString(value: string): boolean {
        return typeof value === 'string' && value.length > 0
    }

    static isPublicKey(key: string): boolean {
        return typeof key === 'string' && CORE_VALIDATION_PATTERNS.PUBLIC_KEY.test(key)
    }

    static isPrivateKey(key: string): boolean {
        return typeof key === 'string' && CORE_VALIDATION_PATTERNS.PRIVATE_KEY.test(key)
    }
}
