import type { IsoDate } from '../../../common/types/temporal.js';
import type { CapacityFactorSummary, FleetStats, PowerStatus } from '../../capacity-factors/index.js';
import type { SlimDocument, SlimFeedArtifact } from '../../documents/index.js';
import type {
  Coordinates,
  LicenseProfile,
  ReactorTechnology,
  ReactorUnit,
  Site,
} from '../../registry/index.js';

export type PerformanceClass = 'excellent' | 'good' | 'fair' | 'poor' | 'critical' | 'offline';

/**
 * A registry unit joined with its derived metrics.
 */
export interface MetricsReactor extends ReactorUnit {
  siteKey: string;
  license: LicenseProfile;
  performance: CapacityFactorSummary;
}

/**
 * What the dashboard needs from the metrics pipeline.
 */
export interface DashboardMetrics {
  asOf: IsoDate;
  reactors: readonly MetricsReactor[];
  sites: readonly Site[];
  fleet: FleetStats;
}

export interface DashboardInput {
  metrics: DashboardMetrics;
  /** Absent when the document feed has never been fetched */
  documents: SlimFeedArtifact | null;
}

export interface DashboardUnit {
  name: string;
  docketNumber: string;
  licenseNumber: string;
  technology: ReactorTechnology;
  nrcRegion: number | null;
  operator: string;
  parentCompany: string;
  capacityMwe: number | null;
  referenceUrl: string | null;
  license: LicenseProfile;
  performance: CapacityFactorSummary;
  performanceClass: PerformanceClass;
  lastActivity: IsoDate | null;
  documents: SlimDocument[];
}

export interface SiteDocument extends SlimDocument {
  unitName: string;
}

export interface DashboardSite {
  key: string;
  name: string;
  location: string;
  coordinates: Coordinates;
  units: DashboardUnit[];
  totalCapacityMwe: number;
  isMultiUnit: boolean;
  averageCapacityFactor30d: number | null;
  performanceClass: PerformanceClass;
  status: PowerStatus;
  documents: SiteDocument[];
}

export interface Performer {
  name: string;
  siteKey: string;
  coordinates: Coordinates;
  capacityFactor365d: number;
}

export interface DashboardModel {
  asOf: IsoDate;
  fleet: FleetStats;
  sites: DashboardSite[];
  topPerformers: Performer[];
  bottomPerformers: Performer[];
  regions: string[];
  technologies: ReactorTechnology[];
  documents: {
    fetchedAt: string | null;
    totalDocuments: number;
    categoryTotals: Record<string, number>;
  };
}

export const PERFORMER_COUNT = 5;
export const SITE_DOCUMENT_COUNT = 8;
