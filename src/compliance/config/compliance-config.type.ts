export type ComplianceConfig = {
  autoDenyOnAutocheck: boolean;
  autocheckConcurrency: number;
  autocheckEnabled: boolean;
  expiringWindowDays: number;
};
