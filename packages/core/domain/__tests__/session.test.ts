/**
 * Conversation session state machine tests
 */

import { describe, it, expect } from 'vitest';
import {
  ButtonAction,
  decodePayload,
  encodePayload,
  FLOW_STEPS,
  FlowKind,
  FlowStep,
  getNextStep,
  getStepNumber,
  isFinalStep,
  isFlowKind,
  isTextStep,
  isValidAdvance,
  startFlow,
  validateFlowInput,
} from '../session.js';

describe('session', () => {
  describe('step order', () => {
    it('should walk the add subscription flow in order', () => {
      const steps: FlowStep[] = [];
      let step: FlowStep | null = FlowStep.CHOOSE_PERSON;
      while (step !== null) {
        steps.push(step);
        step = getNextStep(FlowKind.ADD_SUBSCRIPTION, step);
      }

      expect(steps).toEqual([
        FlowStep.CHOOSE_PERSON,
        FlowStep.CHOOSE_SERVICE,
        FlowStep.CHOOSE_ACCOUNT,
        FlowStep.CHOOSE_SLOT,
        FlowStep.CHOOSE_DURATION,
      ]);
    });

    it('should have no next step outside the flow', () => {
      expect(getNextStep(FlowKind.ADD_PERSON, FlowStep.CHOOSE_SLOT)).toBeNull();
      expect(getStepNumber(FlowKind.ADD_PERSON, FlowStep.CHOOSE_SLOT)).toBe(0);
    });

    it('should mark only the last step as final', () => {
      expect(isFinalStep(FlowKind.SET_PRICE, FlowStep.ENTER_PRICE)).toBe(true);
      expect(isFinalStep(FlowKind.SET_PRICE, FlowStep.ENTER_EMOJI)).toBe(false);
      expect(isFinalStep(FlowKind.SET_PRICE, FlowStep.CHOOSE_SLOT)).toBe(false);
    });

    it('should start every flow at its first step with no input', () => {
      for (const flow of Object.values(FlowKind)) {
        expect(startFlow(flow)).toEqual({ flow, step: FLOW_STEPS[flow][0], input: {} });
      }
    });

    it('should classify text steps', () => {
      expect(isTextStep(FlowStep.ENTER_EMOJI)).toBe(true);
      expect(isTextStep(FlowStep.CHOOSE_PERSON)).toBe(false);
    });

    it('should recognise flow names', () => {
      expect(isFlowKind('remove_price')).toBe(true);
      expect(isFlowKind('REMOVE_PRICE')).toBe(false);
    });
  });

  describe('isValidAdvance', () => {
    it('should accept the next step of the same flow', () => {
      expect(
        isValidAdvance(
          { flow: FlowKind.REMOVE_PRICE, step: FlowStep.CHOOSE_SERVICE, input: {} },
          { flow: FlowKind.REMOVE_PRICE, step: FlowStep.CHOOSE_DURATION, input: { service: 'Stream' } }
        )
      ).toBe(true);
    });

    it('should reject skipped steps', () => {
      expect(
        isValidAdvance(
          { flow: FlowKind.ADD_SUBSCRIPTION, step: FlowStep.CHOOSE_PERSON, input: {} },
          { flow: FlowKind.ADD_SUBSCRIPTION, step: FlowStep.CHOOSE_ACCOUNT, input: {} }
        )
      ).toBe(false);
    });

    it('should reject a change of flow', () => {
      expect(
        isValidAdvance(
          { flow: FlowKind.REMOVE_SUBSCRIPTION, step: FlowStep.CHOOSE_PERSON, input: {} },
          { flow: FlowKind.ADD_SUBSCRIPTION, step: FlowStep.CHOOSE_SERVICE, input: {} }
        )
      ).toBe(false);
    });
  });

  describe('validateFlowInput', () => {
    it('should accept a session with everything collected', () => {
      expect(
        validateFlowInput({
          flow: FlowKind.ADD_SUBSCRIPTION,
          step: FlowStep.CHOOSE_DURATION,
          input: { person: 'Ann', service: 'Stream', account: 'acc1', slot: '1' },
        })
      ).toEqual({ valid: true, errors: [] });
    });

    it('should name the missing choices', () => {
      expect(
        validateFlowInput({
          flow: FlowKind.ADD_SUBSCRIPTION,
          step: FlowStep.CHOOSE_SLOT,
          input: { person: 'Ann' },
        })
      ).toEqual({ valid: false, errors: ['Service has not been chosen', 'Account has not been chosen'] });
    });

    it('should require the duration before the price', () => {
      expect(
        validateFlowInput({ flow: FlowKind.SET_PRICE, step: FlowStep.ENTER_PRICE, input: { service: 'Stream' } })
      ).toEqual({ valid: false, errors: ['Duration has not been chosen'] });
    });
  });

  describe('payloads', () => {
    it('should keep underscores inside the value', () => {
      const payload = encodePayload(ButtonAction.PERSON, 'Ann_Lee');

      expect(payload).toBe('person_Ann_Lee');
      expect(decodePayload(payload, ButtonAction.PERSON)).toBe('Ann_Lee');
    });

    it('should not decode a payload of another action', () => {
      expect(decodePayload('service_Stream', ButtonAction.PERSON)).toBeNull();
      expect(decodePayload('sub_0', ButtonAction.SUBSCRIPTION)).toBe('0');
    });

    it('should not decode a payload without a value', () => {
      expect(encodePayload(ButtonAction.CANCEL)).toBe('cancel');
      expect(decodePayload('person_', ButtonAction.PERSON)).toBeNull();
    });
  });
});
