/**
 * SoftLayer provisioning defaults
 */

/** Domain used for ordered virtual guests unless replaced; must carry a public suffix */
export const SOFTLAYER_DEFAULT_DOMAIN_NAME = 'jclouds.org'

export const SOFTLAYER_OPTIONS_KIND = 'softlayer'
