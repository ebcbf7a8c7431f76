/**
 * Parses the unique ID format (prefix_hash) to return a displayable short code.
 * Handles cases where the ID might not follow the expected format.
 */
export const shortId = (id: string): string => {
  if (!id) return '???';
  const parts = id.split('_');
  return parts[parts.length - 1].toUpperCase();
};

export const fleetLabel = (fleet: { id: string; name: string }): string =>
  fleet.name ? `${fleet.name} (${shortId(fleet.id)})` : `FLEET ${shortId(fleet.id)}`;

/**
 * Display name for a generated jump point, derived from the first letters of its destination.
 * Example: "JP-SOL"
 */
export const jumpPointName = (targetSystemName: string): string =>
  `JP-${targetSystemName.slice(0, 3).toUpperCase()}`;
