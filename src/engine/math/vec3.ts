export interface Vec3 {
  x: number;
  y: number;
  z: number;
}

export const vec3 = (x: number = 0, y: number = 0, z: number = 0): Vec3 => ({ x, y, z });

export const clone = (v: Vec3): Vec3 => ({ x: v.x, y: v.y, z: v.z });

export const add = (a: Vec3, b: Vec3): Vec3 => ({ x: a.x + b.x, y: a.y + b.y, z: a.z + b.z });

export const distSq = (a: Vec3, b: Vec3): number => {
  const dx = a.x - b.x;
  const dy = a.y - b.y;
  const dz = a.z - b.z;
  return dx * dx + dy * dy + dz * dz;
};

export const dist = (a: Vec3, b: Vec3): number => Math.sqrt(distSq(a, b));

/**
 * Point on the XY plane at `radius` from the origin along `bearing` (radians), lifted by `z`.
 * Jump points and arrival offsets are laid out this way around a system centre.
 */
export const fromPolar = (radius: number, bearing: number, z: number = 0): Vec3 => ({
  x: radius * Math.cos(bearing),
  y: radius * Math.sin(bearing),
  z
});
