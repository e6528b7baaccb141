/**
 * Approve academic graduation
 * Re-evaluates every pending academic clearance. Students with nothing
 * outstanding are approved; the rest keep pending with a refreshed reason.
 */

import type { RegistryDatabase } from '../db/database.js';
import { outstandingReasons, decideClearance } from '../engine/clearance.js';
import { resolveStudentOutstanding } from '../engine/outstanding.js';
import { logger } from '../logger.js';

export interface ApproveSummary {
  total: number;
  approved: number;
  stillPending: number;
  failed: number;
}

export interface ApproveOptions {
  /** Unix seconds recorded as the response date */
  now?: () => number;
}

const unixNow = () => Math.floor(Date.now() / 1000);

export function approveAcademicGraduation(db: RegistryDatabase, options: ApproveOptions = {}): ApproveSummary {
  const now = options.now ?? unixNow;
  const pending = db.getPendingAcademicClearances();
  const summary: ApproveSummary = { total: pending.length, approved: 0, stillPending: 0, failed: 0 };

  if (pending.length === 0) {
    logger.warn('Approve', 'No pending academic graduation requests found');
    return summary;
  }

  logger.info('Approve', `Found ${pending.length} pending academic graduation requests`);

  pending.forEach((request, index) => {
    logger.progress('Approve', index + 1, pending.length, `Student ${request.stdNo}`);

    try {
      const lookup = resolveStudentOutstanding(
        db.getStudentPrograms(request.stdNo),
        structureId => db.getVisibleRequirements(structureId)
      );
      if (!lookup.ok) {
        logger.error('Approve', `No active program for student ${request.stdNo}`);
        summary.failed++;
        return;
      }

      const decision = decideClearance(lookup.outstanding);
      db.applyClearanceDecision(request.clearanceId, decision, now());

      if (decision.status === 'approved') {
        logger.info('Approve', `✓ Approved academic clearance for student ${request.stdNo}`);
        summary.approved++;
      } else {
        logger.warn('Approve', `Requirements not met for student ${request.stdNo}`, {
          reasons: outstandingReasons(lookup.outstanding),
        });
        summary.stillPending++;
      }
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      logger.error('Approve', `Error processing student ${request.stdNo}: ${message}`);
      summary.failed++;
    }
  });

  logger.summary('Academic Clearance', {
    'Requests': summary.total,
    'Approved': summary.approved,
    'Still pending': summary.stillPending,
    'Failed': summary.failed,
  });

  return summary;
}
