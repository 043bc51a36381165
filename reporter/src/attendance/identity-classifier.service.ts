import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import type {
  AttendanceConfig,
  IdentityRules,
} from '@attendance-reports/contract';
import { ATTENDANCE_CONFIG } from '../config/attendance.config';

function endsWithAny(email: string, suffixes: readonly string[]): boolean {
  return suffixes.some((suffix) => email.endsWith(suffix));
}

/**
 * Staff or demonstrator: a staff domain suffix, or one of the manually
 * listed emails that would otherwise pass as a student.
 */
export function isExcludedIdentity(
  email: string,
  rules: IdentityRules,
): boolean {
  const normalized = email.trim().toLowerCase();
  return (
    endsWithAny(normalized, rules.excludedDomains) ||
    rules.excludedEmails.includes(normalized)
  );
}

/** Official institutional student address, as opposed to a personal one. */
export function isVerifiedIdentity(
  email: string,
  rules: IdentityRules,
): boolean {
  return endsWithAny(email.trim().toLowerCase(), rules.verifiedDomains);
}

@Injectable()
export class IdentityClassifierService {
  private readonly rules: IdentityRules;

  constructor(configService: ConfigService) {
    const config =
      configService.getOrThrow<AttendanceConfig>(ATTENDANCE_CONFIG);
    this.rules = {
      excludedDomains: config.excludedDomains,
      excludedEmails: config.excludedEmails,
      verifiedDomains: config.verifiedDomains,
    };
  }

  isExcluded(identityKey: string): boolean {
    return isExcludedIdentity(identityKey, this.rules);
  }

  isVerified(identityKey: string): boolean {
    return isVerifiedIdentity(identityKey, this.rules);
  }
}
