import { RecordTable } from '../core/table';

/**
 * Two loads per design; gearless draws less power at both
 */
export function smallPerformanceTable(): RecordTable {
  return RecordTable.fromRecords([
    { design_type: 'traditional', load: 1, power_consumption: 30 },
    { design_type: 'traditional', load: 2, power_consumption: 50 },
    { design_type: 'gearless', load: 1, power_consumption: 20 },
    { design_type: 'gearless', load: 2, power_consumption: 30 },
  ]);
}

/**
 * Four stress samples over two joints
 */
export function smallStructuralTable(): RecordTable {
  return RecordTable.fromRecords([
    { joint_id: 'base', load: 40, stress: 100, deflection: 2, yield_strength: 300, weight: 2, power: 20 },
    { joint_id: 'base', load: 60, stress: 140, deflection: 3, yield_strength: 300, weight: 2, power: 30 },
    { joint_id: 'wrist', load: 50, stress: 120, deflection: 2.5, yield_strength: 300, weight: 2, power: 20 },
    { joint_id: 'wrist', load: 50, stress: 120, deflection: 2.5, yield_strength: 300, weight: 2, power: 20 },
  ]);
}
