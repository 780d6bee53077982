import type { UserProfile } from '../providers/types/provider-client.ts'

export type DisplayNameFormatter = (profile: UserProfile) => string

/** `name#1234` for accounts that still carry a legacy discriminator. */
export const formatLegacyDisplayName: DisplayNameFormatter = (profile) =>
  profile.discriminator && profile.discriminator !== '0'
    ? `${profile.username}#${profile.discriminator}`
    : profile.username

export const formatPlainDisplayName: DisplayNameFormatter = (profile) =>
  profile.username

export const getDisplayNameFormatter = (
  useLegacyDiscriminator: boolean,
): DisplayNameFormatter =>
  useLegacyDiscriminator ? formatLegacyDisplayName : formatPlainDisplayName
