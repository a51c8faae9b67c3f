/**
 * @fileoverview The ordered check registry. Checks run in this order and
 * report in this order.
 *
 * @module core/linter/registry
 */

import type { Check } from '../../types/lint.js';
import { EX01, GL01, GL02, GL03, GL05, GL06, GL07, GL09, GL10, GL11 } from './checks/global.js';
import {
    PR01,
    PR02,
    PR03,
    PR04,
    PR05,
    PR06,
    PR07,
    PR08,
    PR09,
    PR10,
    PR11,
    PR12,
    PR13,
} from './checks/parameters.js';
import { RT01, RT02, RT03, RT04, RT05, YD01 } from './checks/returns.js';
import { ES01, SS01, SS02, SS03, SS04, SS05, SS06 } from './checks/summary.js';

export const CHECKS: readonly Check[] = Object.freeze([
    GL01,
    GL02,
    GL03,
    GL05,
    GL06,
    GL07,
    GL09,
    GL10,
    GL11,
    SS01,
    SS02,
    SS03,
    SS04,
    SS05,
    SS06,
    ES01,
    EX01,
    PR01,
    PR02,
    PR03,
    PR04,
    PR05,
    PR06,
    PR07,
    PR08,
    PR09,
    PR10,
    PR11,
    PR12,
    PR13,
    RT01,
    RT02,
    RT03,
    RT04,
    RT05,
    YD01,
]);
