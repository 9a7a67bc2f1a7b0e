/**
 * The eight governance domains, aligned with the NIST AI RMF GOVERN function.
 */

import type { Domain } from '../types/models.js';

export const GOVERNANCE_DOMAINS: readonly Domain[] = [
  { id: 'gov1', section: 'GOV 1', title: 'Policies & Procedures' },
  { id: 'gov2', section: 'GOV 2', title: 'Accountability & Roles' },
  { id: 'gov3', section: 'GOV 3', title: 'Human Oversight' },
  { id: 'gov4', section: 'GOV 4', title: 'Culture & Communication' },
  { id: 'gov5', section: 'GOV 5', title: 'External Feedback' },
  { id: 'gov6', section: 'GOV 6', title: 'Third-Party Risk' },
  { id: 'gov7', section: 'GOV 7', title: 'Lifecycle & Tiered Governance' },
  { id: 'gov8', section: 'GOV 8', title: 'Privacy & Security' },
];
