export { dispatch, resolve } from './core/dispatcher'
export { capabilityNames, lookupCapability, renderRule } from './core/capabilities'
export { createDelegate } from './core/delegate'
export type { Delegate, DelegateOptions } from './core/delegate'
export { scanOptions } from './cli/args'
export type { LeadingAction, OptionProblem, ScannedArgs } from './cli/args'
export { resolveConfig } from './config'
export type { Config } from './config'
export { version, versionLine } from './version'
export type {
  BinaryRule,
  CapabilityTable,
  ConstantRule,
  DispatchIO,
  EmissionRule,
  Resolution,
  UnaryRule,
} from './core/types'
