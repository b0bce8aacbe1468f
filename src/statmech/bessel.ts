/**
 * Exponentially scaled modified Bessel functions of the first kind,
 * polynomial approximations of Abramowitz & Stegun 9.8.1–9.8.4
 * (|relative error| < 2e-7).
 *
 * @packageDocumentation
 */

/** `e^{−|x|} I0(x)`. */
export function besselI0Scaled(x: number): number {
  const ax = Math.abs(x);
  if (ax < 3.75) {
    const y = (x / 3.75) ** 2;
    const i0 =
      1.0 +
      y * (3.5156229 + y * (3.0899424 + y * (1.2067492 + y * (0.2659732 + y * (0.360768e-1 + y * 0.45813e-2)))));
    return i0 * Math.exp(-ax);
  }
  const y = 3.75 / ax;
  return (
    (0.39894228 +
      y *
        (0.1328592e-1 +
          y *
            (0.225319e-2 +
              y *
                (-0.157565e-2 +
                  y * (0.916281e-2 + y * (-0.2057706e-1 + y * (0.2635537e-1 + y * (-0.1647633e-1 + y * 0.392377e-2)))))))) /
    Math.sqrt(ax)
  );
}

/** `e^{−|x|} I1(x)`. */
export function besselI1Scaled(x: number): number {
  const ax = Math.abs(x);
  let scaled: number;
  if (ax < 3.75) {
    const y = (x / 3.75) ** 2;
    scaled =
      ax *
      (0.5 + y * (0.87890594 + y * (0.51498869 + y * (0.15084934 + y * (0.2658733e-1 + y * (0.301532e-2 + y * 0.32411e-3)))))) *
      Math.exp(-ax);
  } else {
    const y = 3.75 / ax;
    let tail = 0.2282967e-1 + y * (-0.2895312e-1 + y * (0.1787654e-1 - y * 0.420059e-2));
    tail = 0.39894228 + y * (-0.3988024e-1 + y * (-0.362018e-2 + y * (0.163801e-2 + y * (-0.1031555e-1 + y * tail))));
    scaled = tail / Math.sqrt(ax);
  }
  return x < 0 ? -scaled : scaled;
}
