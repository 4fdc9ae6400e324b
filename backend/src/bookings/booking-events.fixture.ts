// Sample payloads for one stay, expressed in both inbound event shapes.

export const legacyEvent = {
  event_type: 'booking.created',
  booking: {
    booking_id: 'TRB1',
    guest_name: 'Asha Rao',
    guest_email: 'asha@example.com',
    guest_phone: '+919800000001',
    hotel_name: 'The Grand',
    hotel_location: 'Connaught Place, New Delhi',
    check_in_date: '2025-06-05',
    check_out_date: '2025-06-08',
    guest_language: 'hi',
    reference_number: 'REF1',
    hotel_id: 'H9',
    status: 'confirmed',
  },
};

export const envelopedEvent = {
  event_type: 'booking.created',
  events: [
    {
      entity_name: 'booking',
      payload: {
        booking_id: 'TRB1',
        reference_number: 'REF1',
        hotel_id: 'H9',
        status: 'confirmed',
        checkin_date: '2025-06-05T14:00:00+05:30',
        checkout_date: '2025-06-08T11:00:00+05:30',
        guest_language: 'hi',
        source: { channel: 'ota' },
        customers: [
          { first_name: 'Placeholder', email: 'desk@example.com', dummy: true },
          {
            first_name: 'Asha',
            last_name: 'Rao',
            email: 'asha@example.com',
            phone: { country_code: '+91', number: '9800000001' },
          },
        ],
      },
    },
    {
      entity_name: 'bill',
      payload: {
        vendor_details: {
          hotel_name: 'The Grand',
          address: { field_1: 'Connaught Place', city: 'New Delhi', pincode: '110001' },
        },
      },
    },
  ],
};
