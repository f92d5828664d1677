import { vi } from 'vitest';
import { normalizeRequirements } from '../../src/pipeline/normalizer';
import type { RequirementsDocument } from '../../src/types/requirements';
import type { EvidenceMap, EvidenceMatch } from '../../src/types/evidence';

export const JD_TEXT = 'Senior Backend Engineer\nMust know Python.';
export const JD_HASH = '2ba68055a12549bb2d4cde7a1d9b89c676765a15bef57e0922a75bca7a52a760';
export const RESUME_TEXT = 'Built APIs in Python 3.10 for scale.';
export const RESUME_HASH = '1c3fcd649bb72103f090a956a80bb3f4c88b5f98d23d07291690f78b2abb9afc';

export const PYTHON_ID = 'REQ-45356e988b';
export const KUBERNETES_ID = 'REQ-0799d395bb';

export function createMockLogger() {
    return {
        info: vi.fn(),
        error: vi.fn(),
        warn: vi.fn(),
        debug: vi.fn()
    };
}

export function buildRequirementsDocument(overrides: Partial<RequirementsDocument> = {}): RequirementsDocument {
    return {
        role_id: 'backend_engineer',
        jd_hash: JD_HASH,
        requirements_version: '2.0.0',
        created_at: '2026-01-01T00:00:00.000Z',
        role_title: 'Senior Backend Engineer',
        requirements: normalizeRequirements([
            { requirement_key: 'python', name: 'Python', category: 'Technical', importance: 'Must-have', aliases: ['py'] },
            { requirement_key: 'kubernetes', name: 'Kubernetes', category: 'Infrastructure', importance: 'Nice-to-have' }
        ]),
        ...overrides
    };
}

export function buildEvidenceMap(matches: EvidenceMatch[], overrides: Partial<EvidenceMap> = {}): EvidenceMap {
    return {
        role_id: 'backend_engineer',
        jd_hash: JD_HASH,
        resume_hash: RESUME_HASH,
        requirements_version: '2.0.0',
        prompt_version: 'MATCH_EVIDENCE_V2',
        model_id: 'test-match-model',
        run_id: 'run00001',
        matches,
        ...overrides
    };
}
