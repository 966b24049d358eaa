export { previousMonthPeriod, formatPeriodBoundary, periodMonthLabel } from './billing-period.js'
