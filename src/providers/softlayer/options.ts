/**
 * Options supported when creating SoftLayer virtual guests.
 *
 * Start from a static factory on {@link SoftLayerOptionsBuilder} (or a fresh
 * instance) and chain further setters:
 *
 * ```typescript
 * const options = SoftLayerOptionsBuilder.domainName('example.com')
 *   .blockDevices(100, 250)
 *   .hourlyBillingFlag(true)
 *   .inboundPorts(22, 443)
 * ```
 *
 * Every extension field is an {@link Optional}; only the domain name always
 * holds a value.
 */

import type { ReadonlyDeep } from 'type-fest'
import { GenericTemplateOptions, TemplateOptions, type TemplateOptionsSnapshot } from '../../core/options/template-options'
import { CoreBrandedTypeCreators, type DomainName } from '../../core/types/branded'
import { Optional, type Maybe } from '../../core/types'
import {
  checkInteger,
  checkList,
  checkNotNull,
  checkPositiveInteger,
  checkString,
  sequenceArgument
} from '../../core/validation/preconditions'
import { SOFTLAYER_DEFAULT_DOMAIN_NAME, SOFTLAYER_OPTIONS_KIND } from './constants'

interface ExtensionFields {
  domainName: DomainName
  blockDevices: Optional<readonly number[]>
  diskType: Optional<string>
  portSpeed: Optional<number>
  userData: Optional<string>
  primaryNetworkVlanId: Optional<number>
  primaryBackendNetworkVlanId: Optional<number>
  hourlyBillingFlag: Optional<boolean>
  dedicatedAccountHostOnlyFlag: Optional<boolean>
  privateNetworkOnlyFlag: Optional<boolean>
  postInstallScriptUri: Optional<string>
  sshKeys: Optional<readonly number[]>
  notes: Optional<string>
}

export type ProvisioningOptionsSnapshot = TemplateOptionsSnapshot & ReadonlyDeep<{
  kind: typeof SOFTLAYER_OPTIONS_KIND
  domainName: string
  blockDevices?: number[]
  diskType?: string
  portSpeed?: number
  userData?: string
  primaryNetworkVlanId?: number
  primaryBackendNetworkVlanId?: number
  hourlyBillingFlag?: boolean
  dedicatedAccountHostOnlyFlag?: boolean
  privateNetworkOnlyFlag?: boolean
  postInstallScriptUri?: string
  sshKeys?: number[]
  notes?: string
}>

/** Targets `copyTo` knows how to fill; only SoftLayer targets receive the extension group. */
export type ProvisioningCopyTarget = GenericTemplateOptions | SoftLayerProvisioningOptions

const DEFAULT_DOMAIN_NAME = CoreBrandedTypeCreators.createDomainName(SOFTLAYER_DEFAULT_DOMAIN_NAME)

export class SoftLayerProvisioningOptions extends TemplateOptions {
  readonly kind = SOFTLAYER_OPTIONS_KIND

  /** Shared all-defaults instance. Sealed: clone it before configuring. */
  static readonly NONE = new SoftLayerProvisioningOptions().seal()

  protected fields: ExtensionFields = {
    domainName: DEFAULT_DOMAIN_NAME,
    blockDevices: Optional.absent(),
    diskType: Optional.absent(),
    portSpeed: Optional.absent(),
    userData: Optional.absent(),
    primaryNetworkVlanId: Optional.absent(),
    primaryBackendNetworkVlanId: Optional.absent(),
    hourlyBillingFlag: Optional.absent(),
    dedicatedAccountHostOnlyFlag: Optional.absent(),
    privateNetworkOnlyFlag: Optional.absent(),
    postInstallScriptUri: Optional.absent(),
    sshKeys: Optional.absent(),
    notes: Optional.absent(),
  }

  clone(): SoftLayerProvisioningOptions {
    const options = new SoftLayerProvisioningOptions()
    this.copyTo(options)
    return options
  }

  /**
   * Copies the base group onto `to`, then merges the extension group when `to`
   * is a SoftLayer target: each field present here is applied through the
   * target's setter, absent fields leave the target's value in place.
   */
  copyTo(to: ProvisioningCopyTarget): void {
    super.copyTo(to)
    switch (to.kind) {
      case SOFTLAYER_OPTIONS_KIND:
        this.mergeExtensionInto(to)
        break
      case 'generic':
        break
    }
  }

  private mergeExtensionInto(to: SoftLayerProvisioningOptions): void {
    const f = this.fields
    to.domainName(f.domainName)
    if (f.blockDevices.present) {
      to.blockDevices(f.blockDevices.value)
    }
    if (f.diskType.present) {
      to.diskType(f.diskType.value)
    }
    if (f.portSpeed.present) {
      to.portSpeed(f.portSpeed.value)
    }
    if (f.userData.present) {
      to.userData(f.userData.value)
    }
    if (f.primaryNetworkVlanId.present) {
      to.primaryNetworkVlanId(f.primaryNetworkVlanId.value)
    }
    if (f.primaryBackendNetworkVlanId.present) {
      to.primaryBackendNetworkVlanId(f.primaryBackendNetworkVlanId.value)
    }
    if (f.hourlyBillingFlag.present) {
      to.hourlyBillingFlag(f.hourlyBillingFlag.value)
    }
    if (f.dedicatedAccountHostOnlyFlag.present) {
      to.dedicatedAccountHostOnlyFlag(f.dedicatedAccountHostOnlyFlag.value)
    }
    if (f.privateNetworkOnlyFlag.present) {
      to.privateNetworkOnlyFlag(f.privateNetworkOnlyFlag.value)
    }
    if (f.postInstallScriptUri.present) {
      to.postInstallScriptUri(f.postInstallScriptUri.value)
    }
    if (f.sshKeys.present) {
      to.sshKeys(f.sshKeys.value)
    }
    if (f.notes.present) {
      to.notes(f.notes.value)
    }
  }

  /**
   * Replaces the default domain used when ordering virtual guests.
   * The name must end in a public suffix ("example.com", not "localhost").
   */
  domainName(domainName: Maybe<string>): this {
    this.assertMutable('domainName')
    this.fields.domainName = CoreBrandedTypeCreators.createDomainName(checkString(domainName, 'domainName'))
    return this
  }

  /**
   * Capacities, in GB, of the guest's block devices in attachment order.
   */
  blockDevices(capacities: Maybe<Iterable<Maybe<number>>>): this
  blockDevices(...capacities: Array<Maybe<number>>): this
  blockDevices(...args: unknown[]): this {
    this.assertMutable('blockDevices')
    const capacities = checkList(sequenceArgument(args, 'blockDevices'), 'blockDevices', checkPositiveInteger)
    this.fields.blockDevices = Optional.of(capacities)
    return this
  }

  diskType(diskType: Maybe<string>): this {
    this.assertMutable('diskType')
    this.fields.diskType = Optional.of(checkString(diskType, 'diskType'))
    return this
  }

  portSpeed(portSpeed: Maybe<number>): this {
    this.assertMutable('portSpeed')
    this.fields.portSpeed = Optional.of(checkInteger(portSpeed, 'portSpeed'))
    return this
  }

  userData(userData: Maybe<string>): this {
    this.assertMutable('userData')
    this.fields.userData = Optional.of(checkString(userData, 'userData'))
    return this
  }

  primaryNetworkVlanId(vlanId: Maybe<number>): this {
    this.assertMutable('primaryNetworkVlanId')
    this.fields.primaryNetworkVlanId = Optional.of(checkInteger(vlanId, 'primaryNetworkVlanId'))
    return this
  }

  primaryBackendNetworkVlanId(vlanId: Maybe<number>): this {
    this.assertMutable('primaryBackendNetworkVlanId')
    this.fields.primaryBackendNetworkVlanId = Optional.of(checkInteger(vlanId, 'primaryBackendNetworkVlanId'))
    return this
  }

  hourlyBillingFlag(hourlyBillingFlag: boolean): this {
    this.assertMutable('hourlyBillingFlag')
    this.fields.hourlyBillingFlag = Optional.of(hourlyBillingFlag)
    return this
  }

  dedicatedAccountHostOnlyFlag(dedicatedAccountHostOnlyFlag: boolean): this {
    this.assertMutable('dedicatedAccountHostOnlyFlag')
    this.fields.dedicatedAccountHostOnlyFlag = Optional.of(dedicatedAccountHostOnlyFlag)
    return this
  }

  privateNetworkOnlyFlag(privateNetworkOnlyFlag: boolean): this {
    this.assertMutable('privateNetworkOnlyFlag')
    this.fields.privateNetworkOnlyFlag = Optional.of(privateNetworkOnlyFlag)
    return this
  }

  /**
   * Script fetched and run by the guest once the OS install completes.
   */
  postInstallScriptUri(postInstallScriptUri: Maybe<string>): this {
    this.assertMutable('postInstallScriptUri')
    this.fields.postInstallScriptUri = Optional.of(checkString(postInstallScriptUri, 'postInstallScriptUri'))
    return this
  }

  /**
   * Ids of SSH keys already registered with the account.
   */
  sshKeys(sshKeys: Maybe<Iterable<Maybe<number>>>): this
  sshKeys(...sshKeys: Array<Maybe<number>>): this
  sshKeys(...args: unknown[]): this {
    this.assertMutable('sshKeys')
    const keys = checkList(sequenceArgument(args, 'sshKeys'), 'sshKeys', checkInteger)
    this.fields.sshKeys = Optional.of(keys)
    return this
  }

  notes(notes: Maybe<string>): this {
    this.assertMutable('notes')
    this.fields.notes = Optional.of(checkString(notes, 'notes'))
    return this
  }

  getDomainName(): string {
    return this.fields.domainName
  }

  getBlockDevices(): Optional<readonly number[]> {
    return this.fields.blockDevices
  }

  getDiskType(): Optional<string> {
    return this.fields.diskType
  }

  getPortSpeed(): Optional<number> {
    return this.fields.portSpeed
  }

  getUserData(): Optional<string> {
    return this.fields.userData
  }

  getPrimaryNetworkVlanId(): Optional<number> {
    return this.fields.primaryNetworkVlanId
  }

  getPrimaryBackendNetworkVlanId(): Optional<number> {
    return this.fields.primaryBackendNetworkVlanId
  }

  isHourlyBillingFlag(): Optional<boolean> {
    return this.fields.hourlyBillingFlag
  }

  isDedicatedAccountHostOnlyFlag(): Optional<boolean> {
    return this.fields.dedicatedAccountHostOnlyFlag
  }

  isPrivateNetworkOnlyFlag(): Optional<boolean> {
    return this.fields.privateNetworkOnlyFlag
  }

  getPostInstallScriptUri(): Optional<string> {
    return this.fields.postInstallScriptUri
  }

  getSshKeys(): Optional<readonly number[]> {
    return this.fields.sshKeys
  }

  getNotes(): Optional<string> {
    return this.fields.notes
  }

  toSnapshot(): ProvisioningOptionsSnapshot {
    const f = this.fields
    return Object.freeze({
      ...this.baseSnapshot(),
      kind: this.kind,
      domainName: f.domainName,
      ...(f.blockDevices.present ? { blockDevices: f.blockDevices.value } : {}),
      ...(f.diskType.present ? { diskType: f.diskType.value } : {}),
      ...(f.portSpeed.present ? { portSpeed: f.portSpeed.value } : {}),
      ...(f.userData.present ? { userData: f.userData.value } : {}),
      ...(f.primaryNetworkVlanId.present ? { primaryNetworkVlanId: f.primaryNetworkVlanId.value } : {}),
      ...(f.primaryBackendNetworkVlanId.present ? { primaryBackendNetworkVlanId: f.primaryBackendNetworkVlanId.value } : {}),
      ...(f.hourlyBillingFlag.present ? { hourlyBillingFlag: f.hourlyBillingFlag.value } : {}),
      ...(f.dedicatedAccountHostOnlyFlag.present ? { dedicatedAccountHostOnlyFlag: f.dedicatedAccountHostOnlyFlag.value } : {}),
      ...(f.privateNetworkOnlyFlag.present ? { privateNetworkOnlyFlag: f.privateNetworkOnlyFlag.value } : {}),
      ...(f.postInstallScriptUri.present ? { postInstallScriptUri: f.postInstallScriptUri.value } : {}),
      ...(f.sshKeys.present ? { sshKeys: f.sshKeys.value } : {}),
      ...(f.notes.present ? { notes: f.notes.value } : {}),
    })
  }

  toJSON(): ProvisioningOptionsSnapshot {
    return this.toSnapshot()
  }
}
