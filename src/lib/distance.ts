/**
 * Distance Module
 * 等距圓柱投影近似距離
 */

/** 地球半徑（公尺） */
export const EARTH_RADIUS_M = 6371000;

function toRadians(degrees: number): number {
  return (degrees * Math.PI) / 180;
}

/**
 * 計算站點與查詢點之間的距離（公尺）
 * 近距離準確，距離越遠或緯度越高越會低估；極點與換日線附近結果無意義
 */
export function distance(
  stationLat: number,
  stationLon: number,
  pointLat: number,
  pointLon: number
): number {
  const x =
    (toRadians(pointLon) - toRadians(stationLon)) *
    Math.cos(0.5 * (toRadians(pointLat) + toRadians(stationLat)));
  const y = toRadians(pointLat) - toRadians(stationLat);

  return EARTH_RADIUS_M * Math.sqrt(x * x + y * y);
}
