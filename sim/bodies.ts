export function stockBody(storeId: string, quantity: number, locationName = "Test Store"): string {
  return JSON.stringify({
    data: {
      product: {
        fulfillment: {
          store_options: [
            {
              location_id: storeId,
              location_available_to_promise_quantity: quantity,
              store: { location_name: locationName }
            }
          ]
        }
      }
    }
  });
}

export function priceBody(currentRetail: number, title = "Test Product"): string {
  return JSON.stringify({
    data: {
      product: {
        price: { current_retail: currentRetail, formatted_current_price: `$${currentRetail.toFixed(2)}` },
        item: { product_description: { title } }
      }
    }
  });
}
