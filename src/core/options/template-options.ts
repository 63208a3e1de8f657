/**
 * Provider-agnostic provisioning options shared by every provider.
 *
 * Setters return `this`, so calling a base setter on a provider subclass keeps
 * the subclass type and provider-specific chaining stays available.
 *
 * @example
 * ```typescript
 * const options = new GenericTemplateOptions()
 *   .inboundPorts(22, 443)
 *   .userMetadata('team', 'infra')
 *   .nodeNames(['web-1', 'web-2'])
 * ```
 */

import lodash from 'lodash'
import type { ReadonlyDeep } from 'type-fest'
import { invalidArgument, sealedDefaults } from '../errors/codes'
import { CoreBrandedTypeCreators, type Port } from '../types/branded'
import { isNullish, Optional, type Maybe } from '../types'
import { CoreValidators } from '../validation/patterns'
import { checkNonEmptyString, checkNotNull, checkPositiveInteger, checkUniqueList } from '../validation/preconditions'

/** Wait until `port` accepts connections, for at most `seconds`. */
export interface PortWait {
  readonly port: Port
  readonly seconds: number
}

export type UserMetadataInput = Readonly<Record<string, Maybe<string>>> | ReadonlyMap<string, Maybe<string>>

export type TemplateOptionsSnapshot = ReadonlyDeep<{
  kind: string
  inboundPorts: number[]
  blockOnPort?: PortWait
  publicKey?: string
  privateKey?: string
  userMetadata: Record<string, string>
  nodeNames: string[]
  networks: string[]
}>

export const DEFAULT_INBOUND_PORTS: readonly Port[] = Object.freeze([CoreBrandedTypeCreators.createPort(22)])

export abstract class TemplateOptions {
  abstract readonly kind: string

  protected inboundPortList: readonly Port[] = DEFAULT_INBOUND_PORTS
  protected portWait: Optional<PortWait> = Optional.absent()
  protected publicKey: Optional<string> = Optional.absent()
  protected privateKey: Optional<string> = Optional.absent()
  protected metadata: Readonly<Record<string, string>> = Object.freeze({})
  protected nodeNameList: readonly string[] = Object.freeze([])
  protected networkList: readonly string[] = Object.freeze([])

  private sealed = false

  abstract clone(): TemplateOptions

  /**
   * Makes every setter on this instance fail. Used for shared defaults,
   * which callers must `clone()` before configuring.
   */
  seal(): this {
    this.sealed = true
    return this
  }

  isSealed(): boolean {
    return this.sealed
  }

  protected assertMutable(field: string): void {
    if (this.sealed) {
      throw sealedDefaults(field)
    }
  }

  /**
   * Copies the base group onto `to`, replacing whatever it held.
   */
  copyTo(to: TemplateOptions): void {
    to.assertMutable('copyTo')
    to.inboundPortList = this.inboundPortList
    to.portWait = this.portWait
    to.publicKey = this.publicKey
    to.privateKey = this.privateKey
    to.metadata = this.metadata
    to.nodeNameList = this.nodeNameList
    to.networkList = this.networkList
  }

  inboundPorts(...ports: number[]): this {
    this.assertMutable('inboundPorts')
    const checked = ports.map(port => CoreBrandedTypeCreators.createPort(checkNotNull(port, 'inboundPorts'), 'inboundPorts'))
    this.inboundPortList = Object.freeze(checked)
    return this
  }

  blockOnPort(port: number, seconds: number): this {
    this.assertMutable('blockOnPort')
    const checkedPort = CoreBrandedTypeCreators.createPort(checkNotNull(port, 'port'), 'port')
    const checkedSeconds = checkPositiveInteger(seconds, 'seconds')
    this.portWait = Optional.of(Object.freeze({ port: checkedPort, seconds: checkedSeconds }))
    return this
  }

  authorizePublicKey(publicKey: Maybe<string>): this {
    this.assertMutable('authorizePublicKey')
    const key = checkNotNull(publicKey, 'publicKey')
    if (!CoreValidators.isPublicKey(key)) {
      throw invalidArgument('publicKey', 'must be an OpenSSH public key (ssh-rsa, ssh-ed25519, ssh-dss or ecdsa-sha2-*)')
    }
    this.publicKey = Optional.of(key)
    return this
  }

  installPrivateKey(privateKey: Maybe<string>): this {
    this.assertMutable('installPrivateKey')
    const key = checkNotNull(privateKey, 'privateKey')
    if (!CoreValidators.isPrivateKey(key)) {
      throw invalidArgument('privateKey', 'must start with a PEM "-----BEGIN ... PRIVATE KEY-----" header')
    }
    this.privateKey = Optional.of(key)
    return this
  }

  /**
   * Adds entries to the user metadata; existing keys are overwritten.
   */
  userMetadata(userMetadata: Maybe<UserMetadataInput>): this
  userMetadata(key: Maybe<string>, value: Maybe<string>): this
  userMetadata(keyOrMap: Maybe<string | UserMetadataInput>, value?: Maybe<string>): this {
    this.assertMutable('userMetadata')
    const entries: Array<[string, string]> = []

    if (typeof keyOrMap === 'string') {
      entries.push([keyOrMap, checkNotNull(value, `userMetadata.${keyOrMap}`)])
    } else {
      for (const [key, entryValue] of metadataEntries(checkNotNull(keyOrMap, 'userMetadata'))) {
        if (isNullish(entryValue)) {
          throw invalidArgument('userMetadata', `value for ${key} must not be null`)
        }
        entries.push([key, entryValue])
      }
    }

    this.metadata = Object.freeze({ ...this.metadata, ...Object.fromEntries(entries) })
    return this
  }

  /**
   * Names for the created nodes, de-duplicated in first-seen order.
   */
  nodeNames(nodeNames: Maybe<Iterable<Maybe<string>>>): this {
    this.assertMutable('nodeNames')
    this.nodeNameList = checkUniqueList(nodeNames, 'nodeNames', checkNonEmptyString)
    return this
  }

  networks(networks: Maybe<Iterable<Maybe<string>>>): this {
    this.assertMutable('networks')
    this.networkList = checkUniqueList(networks, 'networks', checkNonEmptyString)
    return this
  }

  getInboundPorts(): readonly number[] {
    return this.inboundPortList
  }

  getBlockOnPort(): Optional<PortWait> {
    return this.portWait
  }

  getPublicKey(): Optional<string> {
    return this.publicKey
  }

  getPrivateKey(): Optional<string> {
    return this.privateKey
  }

  getUserMetadata(): Readonly<Record<string, string>> {
    return this.metadata
  }

  getNodeNames(): readonly string[] {
    return this.nodeNameList
  }

  getNetworks(): readonly string[] {
    return this.networkList
  }

  /**
   * Immutable plain view of every set field; absent fields are omitted.
   */
  toSnapshot(): TemplateOptionsSnapshot {
    return Object.freeze(this.baseSnapshot())
  }

  protected baseSnapshot(): TemplateOptionsSnapshot {
    return {
      kind: this.kind,
      inboundPorts: this.inboundPortList,
      ...(this.portWait.present ? { blockOnPort: this.portWait.value } : {}),
      ...(this.publicKey.present ? { publicKey: this.publicKey.value } : {}),
      ...(this.privateKey.present ? { privateKey: this.privateKey.value } : {}),
      userMetadata: this.metadata,
      nodeNames: this.nodeNameList,
      networks: this.networkList,
    }
  }

  equals(other: unknown): boolean {
    return other instanceof TemplateOptions && lodash.isEqual(this.toSnapshot(), other.toSnapshot())
  }

  toJSON(): TemplateOptionsSnapshot {
    return this.toSnapshot()
  }

  toString(): string {
    return `${this.constructor.name}${JSON.stringify(this.toSnapshot())}`
  }
}

function isMetadataMap(source: UserMetadataInput): source is ReadonlyMap<string, Maybe<string>> {
  return source instanceof Map
}

function metadataEntries(source: UserMetadataInput): Array<[string, Maybe<string>]> {
  return isMetadataMap(source) ? [...source.entries()] : Object.entries(source)
}

/**
 * Options for providers without an extension group
 */
export class GenericTemplateOptions extends TemplateOptions {
  readonly kind = 'generic'

  static readonly NONE = new GenericTemplateOptions().seal()

  clone(): GenericTemplateOptions {
    const options = new GenericTemplateOptions()
    this.copyTo(options)
    return options
  }
}
