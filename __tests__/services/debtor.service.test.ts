import {
  addAlias,
  addAliasToDebtor,
  createDebtor,
  findOrLinkDebtorByExternalId,
  getDebtor,
  getDebtorByAlias,
  getOrCreateDebtor,
  linkDebtor,
  linkDebtorByHandle,
  listDebtors,
  rankDebtors,
  resolveDebtor,
  resolveOrCreate,
} from '../../src/services/debtor.service';
import { getOrCreateUser } from '../../src/services/user.service';
import type { Debtor, User } from '../../src/types';
import { createTestUser, useMemoryStore } from '../helpers/ledger';

describe('Debtor Service', () => {
  let user: User;
  let tuan: Debtor;
  let khanh: Debtor;

  beforeEach(async () => {
    useMemoryStore();
    user = await createTestUser();
    tuan = await createDebtor(user.id, 'Tuan');
    khanh = await createDebtor(user.id, 'Khanh Duy');
    await addAliasToDebtor(user.id, tuan.id, 'Béo');
  });

  // ============================================
  // resolveDebtor
  // ============================================
  describe('resolveDebtor', () => {
    it('should resolve an alias before anything else', async () => {
      const result = await resolveDebtor(user.id, 'BÉO');

      expect(result.matchKind).toBe('alias');
      expect(result.exactMatch?.id).toBe(tuan.id);
      expect(result.candidates).toEqual([]);
    });

    it('should prefer the exact name over a fuzzy match differing only in diacritics', async () => {
      const tuanAccent = await createDebtor(user.id, 'Tu\u1ea5n');

      const accented = await resolveDebtor(user.id, 'Tu\u1ea5n');
      expect(accented.matchKind).toBe('name');
      expect(accented.exactMatch?.id).toBe(tuanAccent.id);
      expect(accented.candidates).toEqual([]);

      const plain = await resolveDebtor(user.id, 'Tuan');
      expect(plain.matchKind).toBe('name');
      expect(plain.exactMatch?.id).toBe(tuan.id);
    });

    it('should resolve an exact name case-insensitively', async () => {
      const result = await resolveDebtor(user.id, '  tuan ');

      expect(result.matchKind).toBe('name');
      expect(result.exactMatch?.id).toBe(tuan.id);
    });

    it('should return fuzzy candidates without picking one', async () => {
      const result = await resolveDebtor(user.id, 'tun');

      expect(result.matchKind).toBe('fuzzy');
      expect(result.exactMatch).toBeNull();
      expect(result.candidates.map((c) => [c.debtor.id, c.score, c.matchedOn])).toEqual([[tuan.id, 86, 'Tuan']]);
    });

    it('should keep a perfect reordered match as a candidate', async () => {
      const result = await resolveDebtor(user.id, 'Duy Khanh');

      expect(result.matchKind).toBe('fuzzy');
      expect(result.candidates.map((c) => [c.debtor.id, c.score])).toEqual([[khanh.id, 100]]);
    });

    it('should report none below the threshold', async () => {
      const result = await resolveDebtor(user.id, 'Minh');

      expect(result).toEqual({ exactMatch: null, candidates: [], matchKind: 'none' });
    });

    it('should treat a contained name as exact in the plain variant', async () => {
      const result = await resolveDebtor(user.id, 'khanh', { aliasAware: false });

      expect(result.matchKind).toBe('name');
      expect(result.exactMatch?.id).toBe(khanh.id);
    });

    it('should ignore aliases in the plain variant', async () => {
      const result = await resolveDebtor(user.id, 'béo', { aliasAware: false });

      expect(result.matchKind).toBe('none');
    });

    it('should never see debtors of another user', async () => {
      const other = await getOrCreateUser({ externalId: 'user-2', displayName: 'Minh' });

      const result = await resolveDebtor(other.id, 'Tuan');
      expect(result.matchKind).toBe('none');
    });

    it('should reject blank queries and bad thresholds', async () => {
      await expect(resolveDebtor(user.id, '   ')).rejects.toThrow('nameQuery is required');
      await expect(resolveDebtor(user.id, 'tun', { threshold: 120 })).rejects.toThrow(
        'threshold must be between 0 and 100'
      );
    });
  });

  describe('rankDebtors', () => {
    it('should score aliases too', async () => {
      const candidates = await rankDebtors(user.id, 'beo', 50);

      expect(candidates[0].debtor.id).toBe(tuan.id);
      expect(candidates[0].matchedOn).toBe('Béo');
    });
  });

  // ============================================
  // resolveOrCreate / getOrCreateDebtor
  // ============================================
  describe('resolveOrCreate', () => {
    it('should reuse alias and name matches', async () => {
      expect(await resolveOrCreate(user.id, 'béo')).toMatchObject({ matchKind: 'alias', debtor: { id: tuan.id } });
      expect(await resolveOrCreate(user.id, 'TUAN')).toMatchObject({ matchKind: 'name', debtor: { id: tuan.id } });
    });

    it('should create instead of taking a fuzzy candidate', async () => {
      const result = await resolveOrCreate(user.id, 'tun');

      expect(result.matchKind).toBe('created');
      expect(result.debtor.name).toBe('tun');
      expect(result.debtor.id).not.toBe(tuan.id);
    });
  });

  describe('getOrCreateDebtor', () => {
    it('should be idempotent for the same name', async () => {
      const first = await getOrCreateDebtor(user.id, 'Hoa');
      const second = await getOrCreateDebtor(user.id, ' hoa ');

      expect(second.id).toBe(first.id);
      expect(await listDebtors(user.id)).toHaveLength(3);
    });

    it('should create one debtor under concurrent calls', async () => {
      const [a, b] = await Promise.all([getOrCreateDebtor(user.id, 'Hoa'), getOrCreateDebtor(user.id, 'Hoa')]);

      expect(a.id).toBe(b.id);
    });
  });

  describe('createDebtor', () => {
    it('should allow duplicate names', async () => {
      const again = await createDebtor(user.id, 'Tuan');

      expect(again.id).not.toBe(tuan.id);
      expect((await resolveDebtor(user.id, 'Tuan')).exactMatch?.id).toBe(tuan.id);
    });
  });

  // ============================================
  // Aliases
  // ============================================
  describe('addAlias', () => {
    it('should attach an alias to the debtor with that exact name', async () => {
      const result = await addAlias(user.id, 'Duy', 'khanh duy');

      expect(result.status).toBe('created');
      expect((await getDebtorByAlias(user.id, 'duy'))?.id).toBe(khanh.id);
    });

    it('should report an unknown real name', async () => {
      expect(await addAlias(user.id, 'Bo', 'Nobody')).toEqual({ status: 'not_found' });
    });

    it('should reject an alias already used by another debtor', async () => {
      await expect(addAlias(user.id, 'béo', 'Khanh Duy')).rejects.toMatchObject({
        statusCode: 409,
        message: 'Alias "béo" already belongs to Tuan',
      });
    });

    it('should allow the same alias for different users', async () => {
      const other = await getOrCreateUser({ externalId: 'user-2', displayName: 'Minh' });
      await createDebtor(other.id, 'Hoa');

      const result = await addAlias(other.id, 'Béo', 'Hoa');
      expect(result.status).toBe('created');
    });
  });

  describe('addAliasToDebtor', () => {
    it('should return null for a debtor of another user', async () => {
      const other = await getOrCreateUser({ externalId: 'user-2', displayName: 'Minh' });

      expect(await addAliasToDebtor(other.id, tuan.id, 'Bo')).toBeNull();
    });
  });

  describe('getDebtor', () => {
    it('should fail closed across users', async () => {
      const other = await getOrCreateUser({ externalId: 'user-2', displayName: 'Minh' });

      expect(await getDebtor(other.id, tuan.id)).toBeNull();
      expect((await getDebtor(user.id, tuan.id))?.name).toBe('Tuan');
    });
  });

  // ============================================
  // External links
  // ============================================
  describe('linkDebtor', () => {
    it('should store the external id', async () => {
      const linked = await linkDebtor(user.id, tuan.id, ' chat-99 ');

      expect(linked?.externalId).toBe('chat-99');
    });

    it('should return null for a foreign debtor', async () => {
      const other = await getOrCreateUser({ externalId: 'user-2', displayName: 'Minh' });

      expect(await linkDebtor(other.id, tuan.id, 'chat-99')).toBeNull();
    });
  });

  describe('linkDebtorByHandle', () => {
    it('should link to the account registered under the handle', async () => {
      await getOrCreateUser({ externalId: 'chat-99', displayName: 'Tuan', handle: 'tuan_t' });

      const linked = await linkDebtorByHandle(user.id, tuan.id, '@Tuan_T');
      expect(linked?.externalId).toBe('chat-99');
    });

    it('should return null for an unknown handle', async () => {
      expect(await linkDebtorByHandle(user.id, tuan.id, '@ghost')).toBeNull();
    });
  });

  describe('findOrLinkDebtorByExternalId', () => {
    it('should link the best candidate when it has no link', async () => {
      const result = await findOrLinkDebtorByExternalId(user.id, 'chat-99', 'Tuan');

      expect(result.outcome).toBe('linked_candidate');
      expect(result.debtor).toMatchObject({ id: tuan.id, externalId: 'chat-99' });
    });

    it('should refresh the name of an already linked debtor', async () => {
      await linkDebtor(user.id, tuan.id, 'chat-99');

      const result = await findOrLinkDebtorByExternalId(user.id, 'chat-99', 'Tuấn');
      expect(result.outcome).toBe('already_linked');
      expect(result.debtor).toMatchObject({ id: tuan.id, name: 'Tuấn' });
    });

    it('should create a debtor rather than link a weaker look-alike when the best match is linked', async () => {
      await linkDebtor(user.id, tuan.id, 'chat-1');
      // "tuan" sits inside "tuan anh", so both score 100 and the older Tuan ranks first
      const tuanAnh = await createDebtor(user.id, 'Tuan Anh');

      const result = await findOrLinkDebtorByExternalId(user.id, 'chat-2', 'Tuan');

      expect(result.outcome).toBe('created');
      expect(result.debtor).toMatchObject({ name: 'Tuan', externalId: 'chat-2' });
      expect(result.debtor.id).not.toBe(tuanAnh.id);
      expect(await getDebtor(user.id, tuanAnh.id)).toMatchObject({ externalId: null });
      expect(await getDebtor(user.id, tuan.id)).toMatchObject({ externalId: 'chat-1' });
    });

    it('should create a linked debtor when nothing is close enough', async () => {
      const result = await findOrLinkDebtorByExternalId(user.id, 'chat-55', 'Minh');

      expect(result.outcome).toBe('created');
      expect(result.debtor).toMatchObject({ name: 'Minh', externalId: 'chat-55' });
    });
  });
});
