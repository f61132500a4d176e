import {
  CURVE_ORDER,
  scalarMulG,
  pointAdd,
  pointToHex,
  type Point,
} from '../../crypto/secp256k1';

/**
 * Feldman Verifiable Secret Sharing (VSS).
 *
 * Each party publishes commitments to their polynomial coefficients:
 *   C_j = [a_{j,0}*G, a_{j,1}*G, ..., a_{j,t}*G]
 *
 * Any other party can verify their received Shamir share f_j(x) against C_j:
 *   f_j(x) * G == sum_k( C_{j,k} * x^k )
 */

/** Compute Feldman coefficient commitments for a polynomial */
export function feldmanCommitments(coefficients: bigint[]): string[] {
  return coefficients.map((c) => pointToHex(scalarMulG(c)));
}

/** sum_k( C_k * x^k ) for x in [1, n) */
export function evaluateCommitments(commitments: Point[], x: bigint): Point {
  if (commitments.length === 0) throw new Error('No commitments provided');
  let acc = commitments[commitments.length - 1];
  for (let k = commitments.length - 2; k >= 0; k--) {
    acc = acc.multiply(x).add(commitments[k]);
  }
  return acc;
}

/**
 * Verify that a Shamir share is consistent with the Feldman commitments.
 *
 * @param share f_j(x), the share from party j for evaluation point x
 * @param x the receiving party's evaluation point
 * @param commitments [C_{j,0}, C_{j,1}, ...] from party j
 */
export function verifyFeldmanShare(share: bigint, x: bigint, commitments: Point[]): boolean {
  if (share === 0n || share >= CURVE_ORDER) return false;
  return scalarMulG(share).equals(evaluateCommitments(commitments, x));
}

/** Group public key: sum_j( C_{j,0} ) */
export function combinePublicKey(interceptCommitments: Point[]): Point {
  if (interceptCommitments.length === 0) throw new Error('No commitments provided');
  return interceptCommitments.reduce((total, P) => pointAdd(total, P));
}
