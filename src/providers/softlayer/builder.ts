/**
 * Static entry points: each creates a fresh {@link SoftLayerProvisioningOptions}
 * and applies one setter, so chains can start from any field.
 */

import type { UserMetadataInput } from '../../core/options/template-options'
import type { Maybe } from '../../core/types'
import { SoftLayerProvisioningOptions } from './options'

type ListArgs<T> = Array<Maybe<T>> | [Maybe<Iterable<Maybe<T>>>]

function isSequenceCall<T>(args: ListArgs<T>): args is [Maybe<Iterable<Maybe<T>>>] {
    return args.length === 1 && typeof args[0] === 'object'
}

export class SoftLayerOptionsBuilder {
    /**
     * @see SoftLayerProvisioningOptions#domainName
     */
    static domainName(domainName: Maybe<string>): SoftLayerProvisioningOptions {
        return new SoftLayerProvisioningOptions().domainName(domainName)
    }

    /**
     * @see SoftLayerProvisioningOptions#blockDevices
     */
    static blockDevices(capacities: Maybe<Iterable<Maybe<number>>>): SoftLayerProvisioningOptions
    static blockDevices(...capacities: Array<Maybe<number>>): SoftLayerProvisioningOptions
    static blockDevices(...args: ListArgs<number>): SoftLayerProvisioningOptions {
        const options = new SoftLayerProvisioningOptions()
        return isSequenceCall(args) ? options.blockDevices(args[0]) : options.blockDevices(...args)
    }

    static diskType(diskType: Maybe<string>): SoftLayerProvisioningOptions {
        return new SoftLayerProvisioningOptions().diskType(diskType)
    }

    static portSpeed(portSpeed: Maybe<number>): SoftLayerProvisioningOptions {
        return new SoftLayerProvisioningOptions().portSpeed(portSpeed)
    }

    static userData(userData: Maybe<string>): SoftLayerProvisioningOptions {
        return new SoftLayerProvisioningOptions().userData(userData)
    }

    static primaryNetworkVlanId(vlanId: Maybe<number>): SoftLayerProvisioningOptions {
        return new SoftLayerProvisioningOptions().primaryNetworkVlanId(vlanId)
    }

    static primaryBackendNetworkVlanId(vlanId: Maybe<number>): SoftLayerProvisioningOptions {
        return new SoftLayerProvisioningOptions().primaryBackendNetworkVlanId(vlanId)
    }

    static hourlyBillingFlag(hourlyBillingFlag: boolean): SoftLayerProvisioningOptions {
        return new SoftLayerProvisioningOptions().hourlyBillingFlag(hourlyBillingFlag)
    }

    static dedicatedAccountHostOnlyFlag(dedicatedAccountHostOnlyFlag: boolean): SoftLayerProvisioningOptions {
        return new SoftLayerProvisioningOptions().dedicatedAccountHostOnlyFlag(dedicatedAccountHostOnlyFlag)
    }

    static privateNetworkOnlyFlag(privateNetworkOnlyFlag: boolean): SoftLayerProvisioningOptions {
        return new SoftLayerProvisioningOptions().privateNetworkOnlyFlag(privateNetworkOnlyFlag)
    }

    static postInstallScriptUri(postInstallScriptUri: Maybe<string>): SoftLayerProvisioningOptions {
        return new SoftLayerProvisioningOptions().postInstallScriptUri(postInstallScriptUri)
    }

    /**
     * @see SoftLayerProvisioningOptions#sshKeys
     */
    static sshKeys(sshKeys: Maybe<Iterable<Maybe<number>>>): SoftLayerProvisioningOptions
    static sshKeys(...sshKeys: Array<Maybe<number>>): SoftLayerProvisioningOptions
    static sshKeys(...args: ListArgs<number>): SoftLayerProvisioningOptions {
        const options = new SoftLayerProvisioningOptions()
        return isSequenceCall(args) ? options.sshKeys(args[0]) : options.sshKeys(...args)
    }

    static notes(notes: Maybe<string>): SoftLayerProvisioningOptions {
        return new SoftLayerProvisioningOptions().notes(notes)
    }

    // base-group entry points, typed as the SoftLayer options

    static inboundPorts(...ports: number[]): SoftLayerProvisioningOptions {
        return new SoftLayerProvisioningOptions().inboundPorts(...ports)
    }

    static blockOnPort(port: number, seconds: number): SoftLayerProvisioningOptions {
        return new SoftLayerProvisioningOptions().blockOnPort(port, seconds)
    }

    static authorizePublicKey(publicKey: Maybe<string>): SoftLayerProvisioningOptions {
        return new SoftLayerProvisioningOptions().authorizePublicKey(publicKey)
    }

    static installPrivateKey(privateKey: Maybe<string>): SoftLayerProvisioningOptions {
        return new SoftLayerProvisioningOptions().installPrivateKey(privateKey)
    }

    static userMetadata(userMetadata: Maybe<UserMetadataInput>): SoftLayerProvisioningOptions
    static userMetadata(key: Maybe<string>, value: Maybe<string>): SoftLayerProvisioningOptions
    static userMetadata(keyOrMap: Maybe<string | UserMetadataInput>, value?: Maybe<string>): SoftLayerProvisioningOptions {
        const options = new SoftLayerProvisioningOptions()
        return typeof keyOrMap === 'string' ? options.userMetadata(keyOrMap, value) : options.userMetadata(keyOrMap)
    }

    static nodeNames(nodeNames: Maybe<Iterable<Maybe<string>>>): SoftLayerProvisioningOptions {
        return new SoftLayerProvisioningOptions().nodeNames(nodeNames)
    }

    static networks(networks: Maybe<Iterable<Maybe<string>>>): SoftLayerProvisioningOptions {
        return new SoftLayerProvisioningOptions().networks(networks)
    }
}
