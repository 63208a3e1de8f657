/**
 * Core branded types for multi-provider type safety
 * These types can be used across all cloud providers
 */

import { invalidArgument, invalidDomain } from '../errors/codes'
import { CoreValidators, PORT_RANGE } from '../validation/patterns'

/**
 * Brand utility type for creating type-safe branded types
 */
export type Brand<T, TBrand> = T & { readonly __brand: TBrand }

export type DomainName = Brand<string, 'DomainName'>
export type Port = Brand<number, 'Port'>

/**
 * Type creators that validate and brand values in one step
 */
export class CoreBrandedTypeCreators {
    /**
     * Creates a branded domain name
     * @param value - Hostname carrying a recognized public suffix
     * @throws InvalidDomainError if validation fails
     */
    static createDomainName(value: string): DomainName {
        if (!CoreValidators.hasPublicSuffix(value)) {
            throw invalidDomain(value)
        }
        return value as DomainName
    }

    /**
     * Creates a branded TCP port
     * @param field - Option name reported in the error
     * @throws InvalidArgumentError if the value is not an integer in 1..65535
     */
    static createPort(value: number, field = 'port'): Port {
        if (!CoreValidators.isValidPort(value)) {
            throw invalidArgument(field, `port must be an integer between ${PORT_RANGE.min} and ${PORT_RANGE.max}`, value)
        }
        return value as Port
    }
}
