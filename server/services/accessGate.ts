/**
 * Access Gate
 *
 * Per-resource authorization for quotes and companies. Access is resolved on
 * every call and never cached. A directory lookup that fails or finds nothing
 * denies access rather than raising.
 */

import { isStaff } from '../../shared/permissions';
import type { Company, Identity, Quote } from '../../shared/types';
import { logger } from '../logger';
import type { CompanyDirectory, UserDirectory } from '../storage/types';

export class AccessGate {
  constructor(
    private readonly companies: CompanyDirectory,
    private readonly users: UserDirectory
  ) { }

  async canAccessQuote(quote: Pick<Quote, 'id' | 'createdBy'>, identity: Identity): Promise<boolean> {
    if (isStaff(identity)) return true;
    if (quote.createdBy === identity.id) return true;
    if (!identity.companyId) return false;

    try {
      const company = await this.companies.getCompany(identity.companyId);
      if (!company || !company.quoteSharingEnabled) return false;

      const creator = await this.users.getUser(quote.createdBy);
      return creator?.companyId === identity.companyId;
    } catch (error) {
      logger.warn('[AccessGate] Company sharing lookup failed; denying access', {
        quoteId: quote.id,
        userId: identity.id,
        error,
      });
      return false;
    }
  }

  /**
   * Creator or staff. Company peers may read a shared quote but never change it.
   */
  canMutateQuote(quote: Pick<Quote, 'createdBy'>, identity: Identity): boolean {
    return isStaff(identity) || quote.createdBy === identity.id;
  }

  canManageCompany(company: Pick<Company, 'id'>, identity: Identity): boolean {
    if (isStaff(identity)) return true;
    return identity.role === 'company_admin' && identity.companyId === company.id;
  }

  canAccessCompany(company: Pick<Company, 'id' | 'assignedSalesRep'>, identity: Identity): boolean {
    if (isStaff(identity)) return true;
    if (identity.companyId === company.id) return true;
    return identity.role === 'sales_rep' && company.assignedSalesRep === identity.id;
  }
}
