import type { PaymentProvider } from "../domain/types.js";
import type { PaymentGatewayPort } from "../ports/payment-gateway.js";

export class GatewayRegistry {
  private readonly gateways = new Map<PaymentProvider, PaymentGatewayPort>();

  constructor(gateways: PaymentGatewayPort[]) {
    for (const gateway of gateways) {
      this.gateways.set(gateway.provider, gateway);
    }
  }

  resolve(provider: PaymentProvider): PaymentGatewayPort | undefined {
    return this.gateways.get(provider);
  }

  /** Looks a gateway up by a provider name as it appears in a URL path. */
  findByName(name: string): PaymentGatewayPort | undefined {
    const normalized = name.trim().toLowerCase();
    for (const gateway of this.gateways.values()) {
      if (gateway.provider === normalized) {
        return gateway;
      }
    }
    return undefined;
  }

  providers(): PaymentProvider[] {
    return [...this.gateways.keys()];
  }
}
