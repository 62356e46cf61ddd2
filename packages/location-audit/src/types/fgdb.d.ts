declare module 'fgdb' {
  import type { FeatureCollection } from 'geojson';

  /**
   * Parse an Esri file geodatabase (a .gdb folder, or a zip of one) into a
   * FeatureCollection per layer, keyed by layer name
   */
  function fgdb(source: string | Buffer | ArrayBuffer): Promise<Record<string, FeatureCollection>>;

  export = fgdb;
}
