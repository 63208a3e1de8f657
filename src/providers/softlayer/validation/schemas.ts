/**
 * Zod schema for SoftLayer options read from plain configuration
 * (a YAML/JSON file section, a request body...). Parsed values are applied
 * through the fluent setters, so the options class stays the single source of
 * validation rules at assignment time.
 */

import { z } from 'zod'
import { resolveErrorEnvironment } from '../../../core/config'
import { OptionsErrorCodes } from '../../../core/errors/codes'
import { ValidationError } from '../../../core/errors/taxonomy'
import { CoreValidators, PORT_RANGE } from '../../../core/validation/patterns'
import { SoftLayerProvisioningOptions } from '../options'
import { getDefaultValidationConfig, silentValidationLogger, type ValidationConfig } from './config'
import { formatErrors, mapValidationError } from './error-mapping'
import { DEFAULT_NORMALIZATION, normalizeOptionsInput } from './normalization'

const PortSchema = z.number().int().min(PORT_RANGE.min).max(PORT_RANGE.max)

export const ProvisioningOptionsInputSchema = z.object({
  // base group
  inboundPorts: z.array(PortSchema).optional(),
  blockOnPort: z.object({ port: PortSchema, seconds: z.number().int().positive() }).optional(),
  publicKey: z.string().refine(CoreValidators.isPublicKey, 'Not an OpenSSH public key').optional(),
  privateKey: z.string().refine(CoreValidators.isPrivateKey, 'Not a PEM private key').optional(),
  userMetadata: z.record(z.string()).optional(),
  nodeNames: z.array(z.string().min(1)).optional(),
  networks: z.array(z.string().min(1)).optional(),

  // SoftLayer extension group
  domainName: z.string().refine(CoreValidators.hasPublicSuffix, 'Domain name has no public suffix').optional(),
  blockDevices: z.array(z.number().int().positive()).nonempty().optional(),
  diskType: z.string().optional(),
  portSpeed: z.number().int().optional(),
  userData: z.string().optional(),
  primaryNetworkVlanId: z.number().int().optional(),
  primaryBackendNetworkVlanId: z.number().int().optional(),
  hourlyBillingFlag: z.boolean().optional(),
  dedicatedAccountHostOnlyFlag: z.boolean().optional(),
  privateNetworkOnlyFlag: z.boolean().optional(),
  postInstallScriptUri: z.string().optional(),
  sshKeys: z.array(z.number().int()).nonempty().optional(),
  notes: z.string().optional(),
})

export type ProvisioningOptionsInput = z.input<typeof ProvisioningOptionsInputSchema>
type ParsedInput = z.output<typeof ProvisioningOptionsInputSchema>

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

/**
 * Validates `raw` and returns a fresh options instance holding its values.
 *
 * strict: keys outside the schema are rejected.
 * lenient: strings are trimmed, the domain name lower-cased and unknown keys
 * dropped; each change is reported to `config.logger`.
 *
 * @throws ValidationError listing every failing field
 */
export function parseProvisioningOptions(
  raw: unknown,
  config: ValidationConfig = getDefaultValidationConfig()
): SoftLayerProvisioningOptions {
  const logger = config.logger ?? silentValidationLogger
  let input = raw

  if (config.mode === 'lenient' && isRecord(raw)) {
    input = normalizeOptionsInput(raw, DEFAULT_NORMALIZATION, (field, original, repaired) =>
      logger.logRepair(field, original, repaired))

    for (const [key, value] of Object.entries(raw)) {
      if (!Object.hasOwn(ProvisioningOptionsInputSchema.shape, key)) {
        logger.logDropped(key, value)
      }
    }
  }

  const schema = config.mode === 'strict'
    ? ProvisioningOptionsInputSchema.strict()
    : ProvisioningOptionsInputSchema
  const result = schema.safeParse(input)

  if (!result.success) {
    const errors = mapValidationError(result.error)
    throw new ValidationError(
      OptionsErrorCodes.CONFIG_INVALID,
      { errors, summary: formatErrors(errors) },
      result.error,
      resolveErrorEnvironment()
    )
  }

  return applyInput(result.data)
}

/**
 * Same as {@link parseProvisioningOptions} but returns undefined on invalid input
 */
export function safeParseProvisioningOptions(
  raw: unknown,
  config: ValidationConfig = getDefaultValidationConfig()
): SoftLayerProvisioningOptions | undefined {
  try {
    return parseProvisioningOptions(raw, config)
  } catch (error) {
    if (error instanceof ValidationError) {
      return undefined
    }
    throw error
  }
}

function applyInput(input: ParsedInput): SoftLayerProvisioningOptions {
  const options = new SoftLayerProvisioningOptions()

  if (input.inboundPorts) options.inboundPorts(...input.inboundPorts)
  if (input.blockOnPort) options.blockOnPort(input.blockOnPort.port, input.blockOnPort.seconds)
  if (input.publicKey !== undefined) options.authorizePublicKey(input.publicKey)
  if (input.privateKey !== undefined) options.installPrivateKey(input.privateKey)
  if (input.userMetadata) options.userMetadata(input.userMetadata)
  if (input.nodeNames) options.nodeNames(input.nodeNames)
  if (input.networks) options.networks(input.networks)

  if (input.domainName !== undefined) options.domainName(input.domainName)
  if (input.blockDevices) options.blockDevices(input.blockDevices)
  if (input.diskType !== undefined) options.diskType(input.diskType)
  if (input.portSpeed !== undefined) options.portSpeed(input.portSpeed)
  if (input.userData !== undefined) options.userData(input.userData)
  if (input.primaryNetworkVlanId !== undefined) options.primaryNetworkVlanId(input.primaryNetworkVlanId)
  if (input.primaryBackendNetworkVlanId !== undefined) options.primaryBackendNetworkVlanId(input.primaryBackendNetworkVlanId)
  if (input.hourlyBillingFlag !== undefined) options.hourlyBillingFlag(input.hourlyBillingFlag)
  if (input.dedicatedAccountHostOnlyFlag !== undefined) options.dedicatedAccountHostOnlyFlag(input.dedicatedAccountHostOnlyFlag)
  if (input.privateNetworkOnlyFlag !== undefined) options.privateNetworkOnlyFlag(input.privateNetworkOnlyFlag)
  if (input.postInstallScriptUri !== undefined) options.postInstallScriptUri(input.postInstallScriptUri)
  if (input.sshKeys) options.sshKeys(input.sshKeys)
  if (input.notes !== undefined) options.notes(input.notes)

  return options
}
