import { describe, it, expect } from 'vitest';
import { PathClassifier, GENERIC_RULES, classifyPath, isRootHex } from './PathClassifier';

const ROOT = `0x${'ab'.repeat(32)}`;
const PUBKEY = `0x${'cd'.repeat(48)}`;

describe('PathClassifier', () => {
  describe('block identifiers', () => {
    it('should collapse slots and roots after blocks', () => {
      expect(classifyPath('/eth/v1/beacon/blocks/12345')).toBe('/eth/v1/beacon/blocks/{block_id}');
      expect(classifyPath(`/eth/v1/beacon/blocks/${ROOT}`)).toBe('/eth/v1/beacon/blocks/{block_id}');
    });

    it('should collapse named block ids', () => {
      expect(classifyPath('/eth/v2/beacon/blocks/head/attestations')).toBe(
        '/eth/v2/beacon/blocks/{block_id}/attestations'
      );
      expect(classifyPath('/eth/v1/beacon/headers/finalized')).toBe('/eth/v1/beacon/headers/{block_id}');
      expect(classifyPath('/eth/v1/beacon/blob_sidecars/genesis')).toBe('/eth/v1/beacon/blob_sidecars/{block_id}');
    });

    it('should prefer the slot rule under validator/blocks', () => {
      expect(classifyPath('/eth/v1/validator/blocks/12345')).toBe('/eth/v1/validator/blocks/{slot}');
      expect(classifyPath('/eth/v1/validator/blinded_blocks/77')).toBe('/eth/v1/validator/blinded_blocks/{slot}');
    });

    it('should keep short hex literal after blocks', () => {
      expect(classifyPath('/eth/v1/beacon/blocks/0xabc')).toBe('/eth/v1/beacon/blocks/0xabc');
    });
  });

  describe('state and validator identifiers', () => {
    it('should collapse state and validator ids', () => {
      expect(classifyPath(`/eth/v1/beacon/states/finalized/validators/${PUBKEY}`)).toBe(
        '/eth/v1/beacon/states/{state_id}/validators/{validator_id}'
      );
      expect(classifyPath('/eth/v1/beacon/states/8000/validators/42')).toBe(
        '/eth/v1/beacon/states/{state_id}/validators/{validator_id}'
      );
    });

    it('should collapse committee indices', () => {
      expect(classifyPath('/eth/v1/beacon/states/head/committees/3')).toBe(
        '/eth/v1/beacon/states/{state_id}/committees/{committee_index}'
      );
    });
  });

  describe('epochs, peers and roots', () => {
    it('should collapse epochs after duty segments', () => {
      expect(classifyPath('/eth/v1/validator/duties/attester/123')).toBe('/eth/v1/validator/duties/attester/{epoch}');
      expect(classifyPath('/eth/v1/validator/duties/proposer/9')).toBe('/eth/v1/validator/duties/proposer/{epoch}');
      expect(classifyPath('/eth/v1/validator/liveness/10')).toBe('/eth/v1/validator/liveness/{epoch}');
    });

    it('should collapse any segment after peers', () => {
      expect(classifyPath('/eth/v1/node/peers/16Uiu2HAmTestPeer')).toBe('/eth/v1/node/peers/{peer_id}');
    });

    it('should collapse bootstrap roots', () => {
      expect(classifyPath(`/eth/v1/beacon/light_client/bootstrap/${ROOT}`)).toBe(
        '/eth/v1/beacon/light_client/bootstrap/{block_root}'
      );
    });

    it('should fall back to generic id and root templates', () => {
      expect(classifyPath(`/custom/42/${ROOT}`)).toBe('/custom/{id}/{root}');
    });
  });

  describe('input handling', () => {
    it('should leave plain paths untouched', () => {
      expect(classifyPath('/eth/v1/node/version')).toBe('/eth/v1/node/version');
    });

    it('should return templated paths unchanged', () => {
      expect(classifyPath('/eth/v1/beacon/blocks/{block_id}')).toBe('/eth/v1/beacon/blocks/{block_id}');
      expect(classifyPath('/eth/v1/validator/duties/attester/{epoch}')).toBe(
        '/eth/v1/validator/duties/attester/{epoch}'
      );
    });

    it('should ignore query strings and fragments', () => {
      expect(classifyPath('/eth/v1/beacon/states/head/committees?epoch=5')).toBe(
        '/eth/v1/beacon/states/{state_id}/committees'
      );
      expect(classifyPath('/eth/v1/node/health#ready')).toBe('/eth/v1/node/health');
    });

    it('should classify the path of an absolute URL', () => {
      expect(classifyPath('https://beacon.example.org/eth/v1/beacon/headers/123?x=1')).toBe(
        '/eth/v1/beacon/headers/{block_id}'
      );
    });

    it('should return undefined instead of throwing', () => {
      expect(classifyPath('')).toBeUndefined();
      expect(classifyPath('eth/v1/node/version')).toBeUndefined();
      expect(classifyPath('/eth/%E0%A4%A')).toBeUndefined();
    });
  });

  it('should apply custom rule sets in order', () => {
    const classifier = new PathClassifier([], GENERIC_RULES);

    expect(classifier.classify('/eth/v1/beacon/blocks/12345')).toBe('/eth/v1/beacon/blocks/{id}');
  });

  it('should require 32 bytes for a root', () => {
    expect(isRootHex(ROOT)).toBe(true);
    expect(isRootHex(`0x${'ab'.repeat(31)}`)).toBe(false);
    expect(isRootHex(`0x${'zz'.repeat(32)}`)).toBe(false);
  });
});
