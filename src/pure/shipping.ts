import {Coordinates} from "../types";

// WGS-84
const SEMI_MAJOR_AXIS_M = 6378137;
const FLATTENING = 1 / 298.257223563;
const SEMI_MINOR_AXIS_M = (1 - FLATTENING) * SEMI_MAJOR_AXIS_M;

const MEAN_EARTH_RADIUS_KM = 6371.0088;
const MAX_ITERATIONS = 200;
const CONVERGENCE = 1e-12;

export const DEFAULT_RATE_PER_KM = 0.02;

const toRadians = (degrees: number): number => degrees * Math.PI / 180;

/**
 * Great-circle distance on a sphere of the mean Earth radius.
 */
export function greatCircleKm(from: Coordinates, to: Coordinates): number {
  const dLat = toRadians(to.latitude - from.latitude);
  const dLon = toRadians(to.longitude - from.longitude);
  const a = Math.sin(dLat / 2) ** 2
    + Math.cos(toRadians(from.latitude)) * Math.cos(toRadians(to.latitude)) * Math.sin(dLon / 2) ** 2;
  return 2 * MEAN_EARTH_RADIUS_KM * Math.asin(Math.min(1, Math.sqrt(a)));
}

/**
 * Geodesic distance on the WGS-84 ellipsoid (Vincenty's inverse formula).
 * Nearly antipodal points, where the iteration does not converge, fall back
 * to the great-circle distance.
 */
export function distanceKm(from: Coordinates, to: Coordinates): number {
  const f = FLATTENING;
  const L = toRadians(to.longitude - from.longitude);
  const U1 = Math.atan((1 - f) * Math.tan(toRadians(from.latitude)));
  const U2 = Math.atan((1 - f) * Math.tan(toRadians(to.latitude)));
  const sinU1 = Math.sin(U1);
  const cosU1 = Math.cos(U1);
  const sinU2 = Math.sin(U2);
  const cosU2 = Math.cos(U2);

  let lambda = L;
  for (let i = 0; i < MAX_ITERATIONS; i++) {
    const sinLambda = Math.sin(lambda);
    const cosLambda = Math.cos(lambda);
    const sinSigma = Math.sqrt(
      (cosU2 * sinLambda) ** 2 + (cosU1 * sinU2 - sinU1 * cosU2 * cosLambda) ** 2
    );
    if (sinSigma === 0) return 0;

    const cosSigma = sinU1 * sinU2 + cosU1 * cosU2 * cosLambda;
    const sigma = Math.atan2(sinSigma, cosSigma);
    const sinAlpha = cosU1 * cosU2 * sinLambda / sinSigma;
    const cosSqAlpha = 1 - sinAlpha ** 2;
    // zero on the equator
    const cos2SigmaM = cosSqAlpha !== 0 ? cosSigma - 2 * sinU1 * sinU2 / cosSqAlpha : 0;
    const C = f / 16 * cosSqAlpha * (4 + f * (4 - 3 * cosSqAlpha));

    const previous = lambda;
    lambda = L + (1 - C) * f * sinAlpha
      * (sigma + C * sinSigma * (cos2SigmaM + C * cosSigma * (-1 + 2 * cos2SigmaM ** 2)));

    if (Math.abs(lambda - previous) < CONVERGENCE) {
      const uSq = cosSqAlpha * (SEMI_MAJOR_AXIS_M ** 2 - SEMI_MINOR_AXIS_M ** 2) / SEMI_MINOR_AXIS_M ** 2;
      const A = 1 + uSq / 16384 * (4096 + uSq * (-768 + uSq * (320 - 175 * uSq)));
      const B = uSq / 1024 * (256 + uSq * (-128 + uSq * (74 - 47 * uSq)));
      const deltaSigma = B * sinSigma * (cos2SigmaM + B / 4 * (
        cosSigma * (-1 + 2 * cos2SigmaM ** 2)
        - B / 6 * cos2SigmaM * (-3 + 4 * sinSigma ** 2) * (-3 + 4 * cos2SigmaM ** 2)
      ));
      return SEMI_MINOR_AXIS_M * A * (sigma - deltaSigma) / 1000;
    }
  }
  return greatCircleKm(from, to);
}

export function shippingCostForDistance(distance: number, ratePerKm: number = DEFAULT_RATE_PER_KM): number {
  return ratePerKm * distance;
}
