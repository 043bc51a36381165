import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import type {
  AliasMapping,
  AliasSuggestionDto,
  AttendanceConfig,
} from '@attendance-reports/contract';
import { ATTENDANCE_CONFIG } from '../config/attendance.config';
import { IdentityClassifierService } from './identity-classifier.service';
import {
  compareIdentityKeys,
  representativeEntry,
  type IdentityResolver,
} from './attendance-ledger';
import type { ParticipantRecord } from './attendance.types';

/** Map an email through the alias table; unmapped emails are their own key. */
export function resolveIdentityKey(
  email: string,
  mapping: Readonly<AliasMapping>,
): string {
  return Object.prototype.hasOwnProperty.call(mapping, email)
    ? mapping[email]
    : email;
}

/** Last space-delimited token of a display name. */
export function surnameOf(displayName: string): string {
  const tokens = displayName.split(' ');
  return tokens[tokens.length - 1];
}

/** The line an operator would add to `aliases` in attendance.config.json */
export function formatAliasEntry(suggestion: AliasSuggestionDto): string {
  return `"${suggestion.unresolvedEmail}": "${suggestion.candidateEmail}",`;
}

@Injectable()
export class AliasResolverService implements IdentityResolver {
  private readonly mapping: Readonly<AliasMapping>;

  constructor(
    configService: ConfigService,
    private readonly classifier: IdentityClassifierService,
  ) {
    this.mapping =
      configService.getOrThrow<AttendanceConfig>(ATTENDANCE_CONFIG).aliases;
  }

  resolve(email: string): string {
    return resolveIdentityKey(email, this.mapping);
  }

  /**
   * Identities that are neither staff nor a verified student address,
   * in ascending key order.
   */
  findUnresolved(
    participants: readonly ParticipantRecord[],
  ): ParticipantRecord[] {
    return [...participants]
      .sort(byIdentityKey)
      .filter(
        (p) =>
          !this.classifier.isExcluded(p.identityKey) &&
          !this.classifier.isVerified(p.identityKey),
      );
  }

  /**
   * Guess which verified identity `unresolved` belongs to by looking for
   * its surname inside verified display names. Yields at most one
   * suggestion per candidate identity: its first matching entry.
   * Advisory only: the alias table is never changed here.
   */
  suggestPairingsFor(
    unresolved: ParticipantRecord,
    participants: readonly ParticipantRecord[],
  ): AliasSuggestionDto[] {
    const entry = representativeEntry(unresolved);
    const surname = surnameOf(entry.name);
    const suggestions: AliasSuggestionDto[] = [];

    const candidates = [...participants]
      .sort(byIdentityKey)
      .filter((p) => this.classifier.isVerified(p.identityKey));

    for (const candidate of candidates) {
      for (const day of candidate.days.values()) {
        if (day.name.includes(surname)) {
          suggestions.push({
            unresolvedName: entry.name,
            unresolvedEmail: entry.email,
            candidateName: day.name,
            candidateEmail: day.email,
          });
          break;
        }
      }
    }

    return suggestions;
  }

  /** Suggestions for every unresolved identity, in key order. */
  suggestPairings(
    participants: readonly ParticipantRecord[],
  ): AliasSuggestionDto[] {
    return this.findUnresolved(participants).flatMap((unresolved) =>
      this.suggestPairingsFor(unresolved, participants),
    );
  }
}

function byIdentityKey(a: ParticipantRecord, b: ParticipantRecord): number {
  return compareIdentityKeys(a.identityKey, b.identityKey);
}
