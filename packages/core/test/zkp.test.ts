import { expect } from 'chai';
import {
  ZkpEngine,
  exponentiate,
  solve,
  randomBelow,
  randomToken,
  MIN_TOKEN_LENGTH,
  DEFAULT_TOKEN_LENGTH,
} from '../src/zkp';
import { TOY_GROUP, RFC5114_1024_160 } from '../src/params';
import { CpAuthValidationError } from '../src/errors';

describe('ZkpEngine', () => {
  describe('toy group (p = 23, q = 11, alpha = 4, beta = 9)', () => {
    const zkp = new ZkpEngine(TOY_GROUP);
    const x = 6n;
    const k = 7n;
    const c = 4n;

    it('computes the registration commitment', () => {
      expect(zkp.exponentiate(TOY_GROUP.alpha, x)).to.equal(2n);
      expect(zkp.exponentiate(TOY_GROUP.beta, x)).to.equal(3n);
    });

    it('computes the attempt commitment', () => {
      expect(zkp.exponentiate(TOY_GROUP.alpha, k)).to.equal(8n);
      expect(zkp.exponentiate(TOY_GROUP.beta, k)).to.equal(4n);
    });

    it('solves the response with c * x > k', () => {
      expect(zkp.solve(k, c, x)).to.equal(5n);
    });

    it('accepts the honest response', () => {
      expect(zkp.verify(8n, 4n, 2n, 3n, 4n, 5n)).to.equal(true);
    });

    it('rejects a response computed from a different secret', () => {
      const sFake = zkp.solve(k, c, 7n);
      expect(sFake).to.equal(1n);
      expect(zkp.verify(8n, 4n, 2n, 3n, c, sFake)).to.equal(false);
    });

    it('verifies every challenge in [0, q) for an honest prover', () => {
      for (let challenge = 0n; challenge < TOY_GROUP.q; challenge++) {
        const s = zkp.solve(k, challenge, x);
        expect(zkp.verify(8n, 4n, 2n, 3n, challenge, s), `c = ${challenge}`).to.equal(true);
      }
    });

    it('verifies honest proofs with random nonces', () => {
      for (let i = 0; i < 20; i++) {
        const nonce = zkp.randomNonce();
        const challenge = zkp.randomChallenge();
        const r1 = zkp.exponentiate(TOY_GROUP.alpha, nonce);
        const r2 = zkp.exponentiate(TOY_GROUP.beta, nonce);
        const s = zkp.solve(nonce, challenge, x);
        expect(zkp.verify(r1, r2, 2n, 3n, challenge, s)).to.equal(true);
      }
    });

    it('rejects values outside their ranges', () => {
      expect(zkp.verify(8n + 23n, 4n, 2n, 3n, 4n, 5n)).to.equal(false);
      expect(zkp.verify(8n, 4n, 2n, 3n, 4n, 5n + 11n)).to.equal(false);
      expect(zkp.verify(8n, 4n, 2n, 3n, 11n, 5n)).to.equal(false);
      expect(zkp.verify(8n, 4n, 0n, 3n, 4n, 5n)).to.equal(false);
    });

    it('rejects when only one leg holds', () => {
      // r1 leg correct, r2 leg wrong
      expect(zkp.verify(8n, 5n, 2n, 3n, 4n, 5n)).to.equal(false);
      // r2 leg correct, r1 leg wrong
      expect(zkp.verify(9n, 4n, 2n, 3n, 4n, 5n)).to.equal(false);
    });
  });

  describe('RFC 5114 1024-bit group', () => {
    const zkp = new ZkpEngine(RFC5114_1024_160);
    const { p, q, alpha, beta } = RFC5114_1024_160;

    it('verifies an honest proof with random values', () => {
      const x = randomBelow(q);
      const k = randomBelow(q);
      const c = randomBelow(q);

      const y1 = exponentiate(alpha, x, p);
      const y2 = exponentiate(beta, x, p);
      const r1 = exponentiate(alpha, k, p);
      const r2 = exponentiate(beta, k, p);
      const s = zkp.solve(k, c, x);

      expect(zkp.verify(r1, r2, y1, y2, c, s)).to.equal(true);
    });

    it('rejects a proof from the wrong secret', () => {
      const x = randomBelow(q);
      const xFake = (x + 1n) % q;
      const k = randomBelow(q);
      const c = randomBelow(q - 1n) + 1n;

      const y1 = exponentiate(alpha, x, p);
      const y2 = exponentiate(beta, x, p);
      const r1 = exponentiate(alpha, k, p);
      const r2 = exponentiate(beta, k, p);

      expect(zkp.verify(r1, r2, y1, y2, c, zkp.solve(k, c, xFake))).to.equal(false);
    });
  });
});

describe('exponentiate', () => {
  it('returns 1 for a zero exponent', () => {
    expect(exponentiate(5n, 0n, 7n)).to.equal(1n);
    expect(exponentiate(0n, 0n, 7n)).to.equal(1n);
  });

  it('reduces the base first', () => {
    expect(exponentiate(30n, 1n, 23n)).to.equal(7n);
  });

  it('matches repeated multiplication', () => {
    let expected = 1n;
    for (let e = 0n; e < 40n; e++) {
      expect(exponentiate(3n, e, 1000003n)).to.equal(expected);
      expected = (expected * 3n) % 1000003n;
    }
  });

  it('rejects a modulus below 2', () => {
    expect(() => exponentiate(2n, 3n, 1n)).to.throw(CpAuthValidationError);
  });

  it('rejects a negative exponent', () => {
    expect(() => exponentiate(2n, -1n, 7n)).to.throw(CpAuthValidationError);
  });
});

describe('solve', () => {
  it('takes the direct branch when k >= c * x', () => {
    expect(solve(30n, 2n, 3n, 11n)).to.equal(2n);
  });

  it('takes the complement branch when c * x > k', () => {
    // 5 - 12 = -7 = 4 (mod 11)
    expect(solve(5n, 3n, 4n, 11n)).to.equal(4n);
  });

  it('returns 0, not q, when c * x - k is a multiple of q', () => {
    expect(solve(1n, 3n, 4n, 11n)).to.equal(0n);
  });

  it('always lands in [0, q) and matches the canonical residue', () => {
    const q = 11n;
    for (let k = 0n; k < 15n; k++) {
      for (let c = 0n; c < 12n; c++) {
        const x = 7n;
        const s = solve(k, c, x, q);
        const canonical = (((k - c * x) % q) + q) % q;
        expect(s >= 0n && s < q).to.equal(true);
        expect(s).to.equal(canonical);
      }
    }
  });

  it('rejects negative inputs', () => {
    expect(() => solve(-1n, 1n, 1n, 11n)).to.throw(CpAuthValidationError);
  });
});

describe('randomBelow', () => {
  it('stays below the bound', () => {
    for (let i = 0; i < 200; i++) {
      const v = randomBelow(11n);
      expect(v >= 0n && v < 11n).to.equal(true);
    }
  });

  it('returns 0 for bound 1', () => {
    expect(randomBelow(1n)).to.equal(0n);
  });

  it('covers small ranges', () => {
    const seen = new Set<bigint>();
    for (let i = 0; i < 500; i++) {
      seen.add(randomBelow(4n));
    }
    expect(seen.size).to.equal(4);
  });

  it('rejects a non-positive bound', () => {
    expect(() => randomBelow(0n)).to.throw(CpAuthValidationError);
  });
});

describe('randomToken', () => {
  it('produces URL-safe tokens of the default length', () => {
    const token = randomToken();
    expect(token).to.have.length(DEFAULT_TOKEN_LENGTH);
    expect(token).to.match(/^[A-Za-z0-9_-]+$/);
  });

  it('honours an explicit length', () => {
    expect(randomToken(MIN_TOKEN_LENGTH)).to.have.length(MIN_TOKEN_LENGTH);
    expect(randomToken(33)).to.have.length(33);
  });

  it('does not repeat', () => {
    const tokens = new Set(Array.from({ length: 1000 }, () => randomToken()));
    expect(tokens.size).to.equal(1000);
  });

  it('refuses tokens shorter than the minimum', () => {
    expect(() => randomToken(MIN_TOKEN_LENGTH - 1)).to.throw(CpAuthValidationError);
  });
});
