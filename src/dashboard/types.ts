/**
 * Grafana dashboard model — only the subset the generated definition uses.
 */

export interface GridPos {
  h: number;
  w: number;
  x: number;
  y: number;
}

export interface InfluxQueryTarget {
  refId: string;
  query: string;
  rawQuery: true;
  resultFormat: 'time_series';
}

export interface RowPanel {
  id: number;
  type: 'row';
  title: string;
  collapsed: false;
  gridPos: GridPos;
  panels: [];
}

export interface TimeSeriesPanel {
  id: number;
  type: 'timeseries';
  title: string;
  datasource: string;
  gridPos: GridPos;
  targets: InfluxQueryTarget[];
  fieldConfig: {
    defaults: {
      decimals?: number;
      custom: { lineInterpolation: 'stepAfter'; fillOpacity: number };
    };
    overrides: [];
  };
  options: { legend: { showLegend: false } };
}

export type Panel = RowPanel | TimeSeriesPanel;

export interface GrafanaDashboard {
  uid: string;
  title: string;
  tags: string[];
  timezone: 'browser';
  schemaVersion: number;
  refresh: string;
  time: { from: string; to: string };
  panels: Panel[];
}
