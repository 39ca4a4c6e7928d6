import { asString, cloneValue, UNIT, type Value } from '../../model/values'
import { VARIABLE_NAME_PROPERTY, VARIABLE_VALUE_PIN } from '../../nodes'
import type { NodeHandler } from './types'

const FALLBACK_VARIABLE_NAME = 'var'

/**
 * Writes the linked value, else the `value` literal when its type matches
 * the variable, else Unit.
 */
export const setVariableHandler: NodeHandler = {
  execute: (interpreter, _output, nodeId, node) => {
    const name = asString(node.properties[VARIABLE_NAME_PROPERTY]) ?? FALLBACK_VARIABLE_NAME

    let value: Value | undefined = interpreter.readValueInput(nodeId, VARIABLE_VALUE_PIN)
    if (value === undefined) {
      const literal = node.properties[VARIABLE_VALUE_PIN]
      const expected = interpreter.inputPinType(nodeId, VARIABLE_VALUE_PIN)
      value = literal && literal.type === expected ? cloneValue(literal) : UNIT
    }

    interpreter.setVariable(name, value)
    return interpreter.nextExec(nodeId, 'then')
  },
}
